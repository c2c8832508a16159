/**
 * Simulated domain models
 * All records are immutable (readonly); handlers replace them, never mutate
 */

export type WorkItemId = string & { readonly __brand: 'WorkItemId' };

export const WorkItemId = (id: string): WorkItemId => id as WorkItemId;

export enum WorkItemType {
  BUG = 'BUG',
  TASK = 'TASK',
  FEATURE = 'FEATURE',
  EPIC = 'EPIC',
  CHORE = 'CHORE',
}

export enum Priority {
  CRITICAL = 'CRITICAL',
  HIGH = 'HIGH',
  MEDIUM = 'MEDIUM',
  LOW = 'LOW',
}

// Declaration order is workflow order
export enum WorkflowState {
  FOUND = 'FOUND',
  BACKLOG = 'BACKLOG',
  READY = 'READY',
  IN_PROGRESS = 'IN_PROGRESS',
  IN_TEST = 'IN_TEST',
  DONE = 'DONE',
  RELEASED = 'RELEASED',
}

export type HistoryEntryType =
  | 'CREATED'
  | 'STATE_CHANGE'
  | 'ASSIGNMENT_CHANGE'
  | 'PRIORITY_CHANGE'
  | 'FIELD_CHANGE';

export interface HistoryEntry {
  readonly timestamp: number;
  readonly type: HistoryEntryType;
  readonly user: string;
  readonly from: string;
  readonly to: string;
  readonly field?: string;
}

export interface WorkItem {
  readonly id: WorkItemId;
  readonly title: string;
  readonly description: string;
  readonly type: WorkItemType;
  readonly priority: Priority;
  readonly state: WorkflowState;
  readonly assignee?: string;
  readonly reporter?: string;
  readonly parentId?: WorkItemId;
  readonly history: readonly HistoryEntry[];
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface WorkItemCreateRequest {
  readonly id: string;
  readonly title: string;
  readonly description?: string;
  readonly type?: WorkItemType;
  readonly priority?: Priority;
  readonly state?: WorkflowState;
  readonly assignee?: string;
  readonly reporter?: string;
  readonly parentId?: string;
}

export interface WorkItemUpdate {
  readonly title?: string;
  readonly description?: string;
  readonly priority?: Priority;
  readonly state?: WorkflowState;
  readonly assignee?: string;
  readonly parentId?: WorkItemId;
}

export const createWorkItem = (request: WorkItemCreateRequest, now: number): WorkItem => Object.freeze({
  id: WorkItemId(request.id),
  title: request.title,
  description: request.description ?? '',
  type: request.type ?? WorkItemType.TASK,
  priority: request.priority ?? Priority.MEDIUM,
  state: request.state ?? WorkflowState.FOUND,
  assignee: request.assignee,
  reporter: request.reporter,
  parentId: request.parentId !== undefined ? WorkItemId(request.parentId) : undefined,
  history: Object.freeze([]),
  createdAt: now,
  updatedAt: now,
});

/**
 * Immutable update helper
 * An entry, when given, is appended to the item's history
 */
export const updateWorkItem = (
  item: WorkItem,
  update: WorkItemUpdate,
  now: number,
  entry?: HistoryEntry
): WorkItem => Object.freeze({
  ...item,
  ...update,
  history: entry ? Object.freeze([...item.history, entry]) : item.history,
  updatedAt: now,
});

const PRIORITY_RANK: Record<Priority, number> = {
  [Priority.CRITICAL]: 0,
  [Priority.HIGH]: 1,
  [Priority.MEDIUM]: 2,
  [Priority.LOW]: 3,
};

/**
 * Compare priorities (negative when a is more urgent than b)
 */
export const comparePriority = (a: Priority, b: Priority): number => {
  return PRIORITY_RANK[a] - PRIORITY_RANK[b];
};

const STATE_ORDER: readonly WorkflowState[] = Object.values(WorkflowState);

/**
 * Compare workflow states (negative when a comes earlier in the workflow)
 */
export const compareState = (a: WorkflowState, b: WorkflowState): number => {
  return STATE_ORDER.indexOf(a) - STATE_ORDER.indexOf(b);
};

export interface Release {
  readonly version: string;
  readonly description: string;
  readonly released: boolean;
  readonly workItemIds: readonly WorkItemId[];
}

export interface Project {
  readonly key: string;
  readonly name: string;
  readonly description: string;
  readonly active: boolean;
}

export interface ApiToken {
  readonly token: string;
  readonly projectKey: string;
  readonly description: string;
  readonly expiresAt?: number;
  readonly revoked: boolean;
}

export interface WebhookConfig {
  readonly projectKey: string;
  readonly source: string;
  readonly secret: string;
  readonly enabled: boolean;
}

/** Free-form attribute bag reported by a client or user */
export type ClientReport = Readonly<Record<string, string>>;

/**
 * Configuration value held by the state store
 * Tagged so accessors stay total without casting
 */
export type ConfigValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'identifier'; readonly value: string };

export const ConfigValue = {
  string: (value: string): ConfigValue => ({ kind: 'string', value }),
  number: (value: number): ConfigValue => ({ kind: 'number', value }),
  boolean: (value: boolean): ConfigValue => ({ kind: 'boolean', value }),
  identifier: (value: string): ConfigValue => ({ kind: 'identifier', value }),
} as const;

/**
 * Output of one dispatched command
 * Never null, even for an unknown command
 */
export interface CommandInvocationResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly truncated: boolean;
}

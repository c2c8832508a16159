/**
 * Interactive `update <id>` handler
 *
 * Walks a fixed prompt sequence, taking one staged answer per prompt:
 *
 *   AwaitingItemId → PresentingFieldMenu → AwaitingFieldSelection
 *     → AwaitingNewValue → Terminated(success)
 *
 * Any step may end in Terminated(error); selecting 0 ends in
 * Terminated(cancelled). Nothing is written to the store unless the session
 * reaches success.
 */

import { z } from 'zod';
import { CommandHandler, CommandInvocation } from '../../core/interfaces.js';
import {
  HistoryEntry,
  HistoryEntryType,
  Priority,
  WorkItem,
  WorkItemUpdate,
  WorkflowState,
  updateWorkItem,
} from '../../core/domain.js';
import { UNASSIGNED } from './format.js';

export type EditableField = 'title' | 'description' | 'priority' | 'state' | 'assignee';

export const EDITABLE_FIELDS: ReadonlyArray<{ readonly field: EditableField; readonly label: string }> = [
  { field: 'title', label: 'Title' },
  { field: 'description', label: 'Description' },
  { field: 'priority', label: 'Priority' },
  { field: 'state', label: 'State' },
  { field: 'assignee', label: 'Assignee' },
];

/** Selection assumed when no answer is staged: cancel */
export const EXHAUSTED_SELECTION = '0';

export type UpdateOutcome = 'success' | 'cancelled' | 'error';

export type UpdateState =
  | { readonly kind: 'AwaitingItemId' }
  | { readonly kind: 'PresentingFieldMenu'; readonly item: WorkItem }
  | { readonly kind: 'AwaitingFieldSelection'; readonly item: WorkItem }
  | { readonly kind: 'AwaitingNewValue'; readonly item: WorkItem; readonly field: EditableField }
  | { readonly kind: 'Terminated'; readonly outcome: UpdateOutcome };

type Terminated = Extract<UpdateState, { kind: 'Terminated' }>;
type Pending = Exclude<UpdateState, Terminated>;

const PrioritySchema = z.nativeEnum(Priority);
const StateSchema = z.nativeEnum(WorkflowState);

const INTEGER = /^[+-]?\d+$/;

const fieldValue = (item: WorkItem, field: EditableField): string => {
  switch (field) {
    case 'title':
      return item.title;
    case 'description':
      return item.description;
    case 'priority':
      return item.priority;
    case 'state':
      return item.state;
    case 'assignee':
      return item.assignee ?? UNASSIGNED;
  }
};

const historyType = (field: EditableField): HistoryEntryType => {
  switch (field) {
    case 'priority':
      return 'PRIORITY_CHANGE';
    case 'state':
      return 'STATE_CHANGE';
    case 'assignee':
      return 'ASSIGNMENT_CHANGE';
    default:
      return 'FIELD_CHANGE';
  }
};

export class UpdateSession {
  constructor(private readonly invocation: CommandInvocation) {}

  run(): Terminated {
    let state: UpdateState = { kind: 'AwaitingItemId' };
    while (state.kind !== 'Terminated') {
      state = this.step(state);
    }
    this.invocation.logger.debug('Update session finished', { outcome: state.outcome });
    return state;
  }

  private step(state: Pending): UpdateState {
    switch (state.kind) {
      case 'AwaitingItemId':
        return this.resolveItem();
      case 'PresentingFieldMenu':
        return this.presentMenu(state.item);
      case 'AwaitingFieldSelection':
        return this.readSelection(state.item);
      case 'AwaitingNewValue':
        return this.applyValue(state.item, state.field);
    }
  }

  private fail(message: string): Terminated {
    this.invocation.io.err.println(`Error: ${message}`);
    return { kind: 'Terminated', outcome: 'error' };
  }

  private resolveItem(): UpdateState {
    const id = this.invocation.args.trim();
    if (id.length === 0) {
      return this.fail('No work item ID provided');
    }

    const item = this.invocation.store.findWorkItem(id);
    if (!item) {
      return this.fail(`Work item not found: ${id}`);
    }
    return { kind: 'PresentingFieldMenu', item };
  }

  private presentMenu(item: WorkItem): UpdateState {
    const { out } = this.invocation.io;
    out.println(`Work Item: ${item.id}`);
    EDITABLE_FIELDS.forEach(({ field, label }, index) => {
      out.println(`[${index + 1}] ${label}: ${fieldValue(item, field)}`);
    });
    out.println('[0] Cancel');
    out.println();
    out.println('Enter the number of the field to update: ');
    return { kind: 'AwaitingFieldSelection', item };
  }

  private readSelection(item: WorkItem): UpdateState {
    const answer = this.invocation.io.input.readLine() ?? EXHAUSTED_SELECTION;
    if (!INTEGER.test(answer)) {
      return this.fail('Invalid selection');
    }

    const selection = Number(answer);
    if (selection < 0 || selection > EDITABLE_FIELDS.length) {
      return this.fail('Invalid selection');
    }

    if (selection === 0) {
      this.invocation.io.out.println('Update cancelled');
      return { kind: 'Terminated', outcome: 'cancelled' };
    }

    return { kind: 'AwaitingNewValue', item, field: EDITABLE_FIELDS[selection - 1].field };
  }

  private applyValue(item: WorkItem, field: EditableField): UpdateState {
    const { io, store, now, userRole } = this.invocation;
    io.out.println('Enter new value: ');

    const value = io.input.readLine();
    if (value === null || value.length === 0) {
      return this.fail('Empty value not allowed');
    }

    const update = this.toUpdate(field, value);
    if (!update) {
      return this.fail(`Invalid ${field}: ${value}`);
    }

    const timestamp = now();
    const entry: HistoryEntry = {
      timestamp,
      type: historyType(field),
      user: userRole,
      from: field === 'assignee' && item.assignee === undefined ? 'none' : fieldValue(item, field),
      to: field === 'priority' || field === 'state' ? value.toUpperCase() : value,
      field,
    };

    store.replaceWorkItem(updateWorkItem(item, update, timestamp, entry));
    io.out.println('Field updated successfully');
    return { kind: 'Terminated', outcome: 'success' };
  }

  private toUpdate(field: EditableField, value: string): WorkItemUpdate | null {
    switch (field) {
      case 'priority': {
        const parsed = PrioritySchema.safeParse(value.toUpperCase());
        return parsed.success ? { priority: parsed.data } : null;
      }
      case 'state': {
        const parsed = StateSchema.safeParse(value.toUpperCase());
        return parsed.success ? { state: parsed.data } : null;
      }
      case 'title':
        return { title: value };
      case 'description':
        return { description: value };
      case 'assignee':
        return { assignee: value };
    }
  }
}

export const updateHandler: CommandHandler = (invocation) => {
  new UpdateSession(invocation).run();
};

/**
 * `makechildren <ids> [--title='...']` handler
 * Creates a FEATURE parent for existing, unparented work items
 */

import { CommandHandler, StateStore } from '../../core/interfaces.js';
import {
  Priority,
  WorkItem,
  WorkItemType,
  WorkflowState,
  comparePriority,
  compareState,
  createWorkItem,
  updateWorkItem,
} from '../../core/domain.js';

export const DEFAULT_PARENT_TITLE = 'Parent of child items';

const TITLE_OPTION = '--title=';

export interface MakeChildrenArgs {
  readonly ids: readonly string[];
  readonly title: string;
}

/**
 * Split "<id>,<id> --title='Some title'" into ids and title
 * Quotes around the title are optional; the closing quote ends it.
 */
export const parseMakeChildrenArgs = (args: string): MakeChildrenArgs => {
  const optionAt = args.indexOf(TITLE_OPTION);
  const idPart = optionAt === -1 ? args : args.slice(0, optionAt);
  let title = DEFAULT_PARENT_TITLE;

  if (optionAt !== -1) {
    const raw = args.slice(optionAt + TITLE_OPTION.length).trim();
    const quote = raw.charAt(0);
    const closing = raw.indexOf(quote, 1);
    title = (quote === '\'' || quote === '"') && closing !== -1 ? raw.slice(1, closing) : raw;
  }

  return {
    ids: idPart.split(/[,\s]+/).filter(id => id.length > 0),
    title,
  };
};

type ResolvedChildren = { ok: true; children: WorkItem[] } | { ok: false; message: string };

const resolveChildren = (store: StateStore, ids: readonly string[]): ResolvedChildren => {
  const children = new Map<string, WorkItem>();
  for (const id of ids) {
    const child = store.findWorkItem(id);
    if (!child) {
      return { ok: false, message: `Work item not found: ${id}` };
    }
    if (child.parentId !== undefined) {
      return { ok: false, message: `Work item ${id} already has a parent` };
    }
    children.set(child.id, child);
  }
  return { ok: true, children: [...children.values()] };
};

export const makeChildrenHandler: CommandHandler = ({ args, io, store, now, newId, userRole, logger }) => {
  if (args.trim().length === 0) {
    io.err.println('Error: No work item IDs provided');
    return;
  }

  if (/[a-zA-Z]/.test(args) && !args.includes(TITLE_OPTION)) {
    io.err.println('Error: Invalid work item ID format');
    return;
  }

  const { ids, title } = parseMakeChildrenArgs(args);
  if (ids.length === 0) {
    io.err.println('Error: No work item IDs provided');
    return;
  }

  const resolved = resolveChildren(store, ids);
  if (!resolved.ok) {
    io.err.println(`Error: ${resolved.message}`);
    return;
  }

  const { children } = resolved;
  // Parent takes the most urgent priority and the least advanced state
  const priority = children.map(child => child.priority).sort(comparePriority)[0] ?? Priority.MEDIUM;
  const state = children.map(child => child.state).sort(compareState)[0] ?? WorkflowState.FOUND;

  const timestamp = now();
  const parent = createWorkItem({
    id: newId(),
    title,
    type: WorkItemType.FEATURE,
    priority,
    state,
    reporter: userRole,
  }, timestamp);

  store.saveWorkItem(parent.id, parent);
  for (const child of children) {
    store.replaceWorkItem(updateWorkItem(child, { parentId: parent.id }, timestamp));
  }

  logger.debug('Created parent work item', { parentId: parent.id, childCount: children.length });
  io.out.println(`Successfully created parent work item with title: ${title}`);
  io.out.println(`Parent ID: ${parent.id}`);
};

/**
 * `list` handler
 *   list p       parent items as a table
 *   list pretty  parent/child hierarchy as a tree
 *   list         every item as a table
 */

import { CommandHandler, OutputChannel } from '../../core/interfaces.js';
import { WorkItem } from '../../core/domain.js';
import { renderWorkItemTable } from './format.js';

const groupChildren = (items: readonly WorkItem[]): Map<string, WorkItem[]> => {
  const known = new Set<string>(items.map(item => item.id));
  const children = new Map<string, WorkItem[]>();

  for (const item of items) {
    // Children of items the store does not hold are left out
    if (item.parentId === undefined || !known.has(item.parentId)) {
      continue;
    }
    const siblings = children.get(item.parentId) ?? [];
    siblings.push(item);
    children.set(item.parentId, siblings);
  }
  return children;
};

function renderBranch(
  out: OutputChannel,
  children: Map<string, WorkItem[]>,
  parentId: string,
  prefix: string,
  visited: Set<string>
): void {
  const kids = children.get(parentId) ?? [];
  kids.forEach((kid, index) => {
    const last = index === kids.length - 1;
    visited.add(kid.id);
    out.println(`${prefix}${last ? '└── ' : '├── '}${kid.title}`);
    renderBranch(out, children, kid.id, `${prefix}${last ? '    ' : '│   '}`, visited);
  });
}

export const listHandler: CommandHandler = ({ args, io, store, logger }) => {
  const items = store.listWorkItems();
  const mode = args.trim();

  if (mode === 'p') {
    const children = groupChildren(items);
    const parents = items.filter(item => children.has(item.id));
    renderWorkItemTable(parents).forEach(line => io.out.println(line));
    return;
  }

  if (mode === 'pretty') {
    const children = groupChildren(items);
    if (children.size === 0) {
      io.out.println('No parent-child relationships found');
      return;
    }

    const known = new Set<string>(items.map(item => item.id));
    const roots = items.filter(item =>
      children.has(item.id) && (item.parentId === undefined || !known.has(item.parentId))
    );

    const visited = new Set<string>();
    for (const root of roots) {
      visited.add(root.id);
      io.out.println(root.title);
      renderBranch(io.out, children, root.id, '  ', visited);
    }

    // Anything with a known parent that no root reaches sits on a cycle
    const cyclic = items.filter(item => children.has(item.id) && !visited.has(item.id));
    if (cyclic.length > 0) {
      logger.warn('Parent cycle in simulated work items', { ids: cyclic.map(item => item.id) });
      io.err.println(`Warning: Circular dependency detected: ${cyclic.map(item => item.id).join(', ')}`);
    }
    return;
  }

  renderWorkItemTable(items).forEach(line => io.out.println(line));
};

/**
 * Shared rendering helpers for the simulated handlers
 */

import { WorkItem } from '../../core/domain.js';

export const UNASSIGNED = 'Unassigned';

export const TABLE_HEADER = ['ID', 'Title', 'Type', 'Priority', 'State', 'Assignee'] as const;

// Cell text must not contain the column separator
const cell = (value: string): string => value.replace(/\|/g, '/');

/**
 * Render items as a six-column pipe table: header, separator, one row each
 */
export function renderWorkItemTable(items: readonly WorkItem[]): string[] {
  const rows = items.map(item => [
    item.id,
    item.title,
    item.type,
    item.priority,
    item.state,
    item.assignee ?? UNASSIGNED,
  ].map(cell));

  const widths = TABLE_HEADER.map((title, column) =>
    Math.max(title.length, ...rows.map(row => row[column].length))
  );

  const line = (cells: readonly string[]): string =>
    cells
      .map((value, column) => (column === cells.length - 1 ? value : value.padEnd(widths[column])))
      .join(' | ');

  return [
    line(TABLE_HEADER),
    line(widths.map(width => '-'.repeat(width))),
    ...rows.map(line),
  ];
}

/** ISO-8601 at second precision, e.g. 2025-04-05T14:32:10Z */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

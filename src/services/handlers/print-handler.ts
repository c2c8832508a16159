/**
 * `print <id>` handler - full detail dump of one work item
 */

import { CommandHandler } from '../../core/interfaces.js';
import { formatTimestamp, UNASSIGNED } from './format.js';

export const printHandler: CommandHandler = ({ args, io, store }) => {
  const id = args.trim();
  if (id.length === 0) {
    io.err.println('Error: No work item ID provided');
    return;
  }

  const item = store.findWorkItem(id);
  if (!item) {
    io.err.println(`Error: Work item not found: ${id}`);
    return;
  }

  const lines: string[] = [];
  lines.push('Work Item Details');
  lines.push('----------------');
  lines.push(`ID: ${item.id}`);
  lines.push(`Title: ${item.title}`);
  lines.push(`Description: ${item.description}`);
  lines.push(`Type: ${item.type}`);
  lines.push(`Priority: ${item.priority}`);
  lines.push(`State: ${item.state}`);
  lines.push(`Assignee: ${item.assignee ?? UNASSIGNED}`);
  lines.push(`Reporter: ${item.reporter ?? 'Unknown'}`);
  lines.push(`Created: ${formatTimestamp(item.createdAt)}`);
  lines.push(`Updated: ${formatTimestamp(item.updatedAt)}`);
  lines.push('');

  if (item.parentId === undefined) {
    lines.push('Parent: None');
  } else {
    const parent = store.findWorkItem(item.parentId);
    lines.push(parent ? `Parent: ${parent.id} (${parent.title})` : `Parent: ${item.parentId}`);
  }

  const children = store.listWorkItems().filter(candidate => candidate.parentId === item.id);
  lines.push(`Children: ${children.length > 0 ? children.map(child => child.id).join(', ') : 'None'}`);
  lines.push('');

  lines.push('History:');
  const history = [...item.history].sort((a, b) => a.timestamp - b.timestamp);
  if (history.length === 0) {
    lines.push('No history');
  }
  for (const entry of history) {
    lines.push(`${formatTimestamp(entry.timestamp)}: ${entry.type} by ${entry.user}: ${entry.from} → ${entry.to}`);
  }
  lines.push('');

  lines.push('Metadata:');
  const metadata = store.listMetadata(item.id);
  if (metadata.length === 0) {
    lines.push('No metadata');
  }
  for (const [key, value] of metadata) {
    lines.push(`${key}: ${value}`);
  }

  lines.forEach(line => io.out.println(line));
};

/**
 * CLI display layer
 *
 * Replayed command output is written untouched: captured stdout to
 * process.stdout, captured stderr to process.stderr. Everything the CLI says
 * about the replay itself goes to stderr, styled with @clack/prompts on a TTY
 * and as plain lines in pipes/CI.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';

const isTTY = process.stderr.isTTY === true;
const output = process.stderr;

export function error(msg: string): void {
  if (isTTY) {
    p.log.error(msg, { output });
  } else {
    output.write(`error: ${msg}\n`);
  }
}

export function info(msg: string): void {
  if (isTTY) {
    p.log.info(msg, { output });
  } else {
    output.write(`${msg}\n`);
  }
}

export function warn(msg: string): void {
  if (isTTY) {
    p.log.warn(msg, { output });
  } else {
    output.write(`warning: ${msg}\n`);
  }
}

// Boxed display (usage, replay summary)
export function note(msg: string, title?: string): void {
  if (isTTY) {
    p.note(msg, title, { output });
  } else {
    if (title) output.write(`${title}\n`);
    output.write(`${msg}\n`);
  }
}

export function colorExitCode(code: number): string {
  if (!isTTY) return String(code);
  return code === 0 ? pc.green(String(code)) : pc.red(String(code));
}

// Captured channels, byte for byte
export function stdout(text: string): void {
  process.stdout.write(text);
}

export function stderr(text: string): void {
  process.stderr.write(text);
}

export function bold(text: string): string {
  return isTTY ? pc.bold(text) : text;
}

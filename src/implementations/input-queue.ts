/**
 * FIFO queue of staged answers for interactive commands
 * Reads never wait: an empty queue answers null
 */

import { InputQueue } from '../core/interfaces.js';

export class FIFOInputQueue implements InputQueue {
  private readonly entries: string[] = [];

  stage(...values: string[]): void {
    this.entries.push(...values);
  }

  next(): string | null {
    return this.entries.shift() ?? null;
  }

  peek(): string | null {
    return this.entries[0] ?? null;
  }

  drain(): readonly string[] {
    return Object.freeze(this.entries.splice(0, this.entries.length));
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  clear(): void {
    this.entries.length = 0;
  }
}

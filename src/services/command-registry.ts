/**
 * Explicit (family, subcommand) → handler registry
 * Built once at startup; lookups never parse anything
 */

import { CommandHandler } from '../core/interfaces.js';
import { Result, ok, err } from '../core/result.js';
import { HarnessError, duplicateHandler } from '../core/errors.js';

const FALLBACK = '*';

export class CommandRegistry {
  private readonly families = new Map<string, Map<string, CommandHandler>>();

  register(family: string, subcommand: string, handler: CommandHandler): Result<void, HarnessError> {
    let handlers = this.families.get(family);
    if (!handlers) {
      handlers = new Map<string, CommandHandler>();
      this.families.set(family, handlers);
    }

    if (handlers.has(subcommand)) {
      return err(duplicateHandler(family, subcommand));
    }

    handlers.set(subcommand, handler);
    return ok(undefined);
  }

  /**
   * Handler for any subcommand of the family that has no handler of its own
   */
  registerFallback(family: string, handler: CommandHandler): Result<void, HarnessError> {
    return this.register(family, FALLBACK, handler);
  }

  resolve(family: string, subcommand: string): CommandHandler | null {
    const handlers = this.families.get(family);
    if (!handlers) {
      return null;
    }
    return handlers.get(subcommand) ?? handlers.get(FALLBACK) ?? null;
  }

  hasFamily(family: string): boolean {
    return this.families.has(family);
  }

  subcommands(family: string): readonly string[] {
    const handlers = this.families.get(family);
    if (!handlers) {
      return Object.freeze([]);
    }
    return Object.freeze([...handlers.keys()].filter(name => name !== FALLBACK));
  }
}

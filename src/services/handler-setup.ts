/**
 * Handler setup
 * Builds the command registry for the simulated tool in one place
 */

import { CommandHandler } from '../core/interfaces.js';
import { Result, ok } from '../core/result.js';
import { HarnessError } from '../core/errors.js';
import { CommandRegistry } from './command-registry.js';
import { listHandler } from './handlers/list-handler.js';
import { updateHandler } from './handlers/update-handler.js';
import { printHandler } from './handlers/print-handler.js';
import { makeChildrenHandler } from './handlers/make-children-handler.js';
import { fallbackHandler } from './handlers/fallback-handler.js';

export const SIMULATED_SUBCOMMANDS: ReadonlyArray<readonly [string, CommandHandler]> = [
  ['list', listHandler],
  ['update', updateHandler],
  ['print', printHandler],
  ['makechildren', makeChildrenHandler],
];

/**
 * Register the simulated subcommands under the tool's family name
 * Extra handlers are registered after the defaults and may not replace them
 */
export function setupHandlers(
  toolName: string,
  extra: ReadonlyArray<readonly [string, CommandHandler]> = []
): Result<CommandRegistry, HarnessError> {
  const registry = new CommandRegistry();

  for (const [subcommand, handler] of [...SIMULATED_SUBCOMMANDS, ...extra]) {
    const result = registry.register(toolName, subcommand, handler);
    if (!result.ok) {
      return result;
    }
  }

  const fallback = registry.registerFallback(toolName, fallbackHandler);
  if (!fallback.ok) {
    return fallback;
  }

  return ok(registry);
}

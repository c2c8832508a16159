/**
 * Command dispatcher
 * Parses "<family> <subcommand> <args>", opens a capture scope, runs the
 * registered handler and hands back what it wrote.
 */

import {
  CapturedOutput,
  CaptureScope,
  CommandRunner,
  InputQueue,
  Logger,
  StateStore,
  StreamCapture,
} from '../core/interfaces.js';
import { CommandInvocationResult } from '../core/domain.js';
import { Result, ok, err, tryCatch } from '../core/result.js';
import { HarnessError, captureAlreadyActive, handlerFailed, invalidCommand } from '../core/errors.js';
import { CommandRegistry } from './command-registry.js';

export interface ParsedCommand {
  readonly family: string;
  readonly subcommand: string;
  /** Everything after the subcommand and its separating whitespace */
  readonly args: string;
}

/**
 * Split a command and its argument string
 * The first token of `command` picks the family; the remaining tokens of
 * `command` followed by `args` give the subcommand and the flat argument string.
 * Returns null for a blank command.
 */
export const parseCommand = (command: string, args = ''): ParsedCommand | null => {
  const head = /^(\S+)\s*([\s\S]*)$/.exec(command.trim());
  if (!head) {
    return null;
  }

  const family = head[1];
  const commandRest = head[2];
  const remainder = commandRest.length > 0 && args.length > 0
    ? `${commandRest} ${args}`
    : commandRest + args;

  const tail = /^(\S*)(?:\s+([\s\S]*))?$/.exec(remainder.trimStart());
  return {
    family,
    subcommand: tail?.[1] ?? '',
    args: tail?.[2] ?? '',
  };
};

/** A stderr line starting with "Error:" marks a caller-visible failure */
export const exitCodeFor = (stderr: string): number =>
  stderr.split('\n').some(line => line.startsWith('Error:')) ? 1 : 0;

/**
 * Open a capture scope fed with every staged answer
 * Refuses before draining, so staged answers survive a rejected call
 */
export const openScope = (
  capture: StreamCapture,
  input: InputQueue
): Result<CaptureScope, HarnessError> => {
  if (capture.isActive()) {
    return err(captureAlreadyActive());
  }
  return capture.begin(input.drain());
};

export interface DispatcherDependencies {
  readonly registry: CommandRegistry;
  readonly capture: StreamCapture;
  readonly input: InputQueue;
  readonly store: StateStore;
  readonly logger: Logger;
  readonly userRole: () => string;
  readonly now: () => number;
  readonly newId: () => string;
}

export class CommandDispatcher implements CommandRunner {
  private readonly logger: Logger;

  constructor(private readonly deps: DispatcherDependencies) {
    this.logger = deps.logger.child({ module: 'CommandDispatcher' });
  }

  run(command: string, args = ''): Result<CommandInvocationResult, HarnessError> {
    const parsed = parseCommand(command, args);
    if (!parsed) {
      return err(invalidCommand(command, 'command must not be blank'));
    }

    const scopeResult = openScope(this.deps.capture, this.deps.input);
    if (!scopeResult.ok) {
      return scopeResult;
    }

    let outcome: Result<void, HarnessError>;
    let captured: Result<CapturedOutput, HarnessError>;
    try {
      outcome = this.invoke(parsed, scopeResult.value);
    } finally {
      captured = this.deps.capture.end();
    }

    if (!captured.ok) {
      return captured;
    }
    if (!outcome.ok) {
      this.logger.error('Handler threw', outcome.error, {
        family: parsed.family,
        subcommand: parsed.subcommand,
      });
      return outcome;
    }

    const exitCode = exitCodeFor(captured.value.stderr);
    this.logger.debug('Command completed', {
      family: parsed.family,
      subcommand: parsed.subcommand,
      exitCode,
      truncated: captured.value.truncated,
    });

    return ok({
      stdout: captured.value.stdout,
      stderr: captured.value.stderr,
      exitCode,
      truncated: captured.value.truncated,
    });
  }

  private invoke(parsed: ParsedCommand, io: CaptureScope): Result<void, HarnessError> {
    const handler = this.deps.registry.resolve(parsed.family, parsed.subcommand);

    if (!handler) {
      this.logger.debug('Unknown command family', { family: parsed.family });
      io.out.println(`Unknown command: ${parsed.family}`);
      io.err.println(`Error: Command not found: ${parsed.family}`);
      return ok(undefined);
    }

    this.logger.debug('Dispatching command', {
      family: parsed.family,
      subcommand: parsed.subcommand,
    });

    return tryCatch(
      () => handler({
        family: parsed.family,
        subcommand: parsed.subcommand,
        args: parsed.args,
        io,
        store: this.deps.store,
        userRole: this.deps.userRole(),
        now: this.deps.now,
        newId: this.deps.newId,
        logger: this.logger.child({ subcommand: parsed.subcommand }),
      }),
      (error) => handlerFailed(parsed.family, parsed.subcommand, error)
    );
  }
}

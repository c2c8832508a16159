import { readFileSync } from 'fs';
import { z } from 'zod';
import { Priority, WorkItemType, WorkflowState } from '../../core/domain.js';
import { Result, ok, err, tryCatch } from '../../core/result.js';
import { HarnessError, errorMessage, invalidSeed } from '../../core/errors.js';
import { createTestContext } from '../../bootstrap.js';
import { TestContext } from '../../services/test-context.js';
import * as ui from '../ui.js';

const SeedItemSchema = z.object({
  // Store key; defaults to the id
  key: z.string().min(1).optional(),
  id: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  type: z.nativeEnum(WorkItemType).optional(),
  priority: z.nativeEnum(Priority).optional(),
  state: z.nativeEnum(WorkflowState).optional(),
  assignee: z.string().optional(),
  reporter: z.string().optional(),
  parentId: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

export const SeedSchema = z.object({
  workItems: z.array(SeedItemSchema).default([]),
  flags: z.array(z.string()).default([]),
});

export type Seed = z.infer<typeof SeedSchema>;

/**
 * Parse seed JSON into the state a replay starts from
 */
export function parseSeed(text: string, source = 'seed'): Result<Seed, HarnessError> {
  const json = tryCatch((): unknown => JSON.parse(text), (e) => invalidSeed(source, errorMessage(e)));
  if (!json.ok) {
    return json;
  }

  const parsed = SeedSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(invalidSeed(source, `${issue.path.join('.')}: ${issue.message}`));
  }
  return ok(parsed.data);
}

export function applySeed(context: TestContext, seed: Seed): void {
  for (const { key, metadata, ...request } of seed.workItems) {
    const item = context.addWorkItem(key ?? request.id, request);
    for (const [name, value] of Object.entries(metadata ?? {})) {
      context.saveWorkItemMetadata(item.id, name, value);
    }
  }
  for (const flag of seed.flags) {
    context.setFlag(flag, true);
  }
}

export interface RunOptions {
  readonly command: string;
  readonly args: string;
  readonly inputs: readonly string[];
  readonly role?: string;
  readonly seedPath?: string;
  readonly summary: boolean;
}

/**
 * Replay one command against a fresh context and echo what it wrote
 * Resolves to the replayed command's exit code.
 */
export function runCommand(options: RunOptions): Result<number, HarnessError> {
  const contextResult = createTestContext();
  if (!contextResult.ok) {
    return contextResult;
  }
  const context = contextResult.value;

  try {
    if (options.seedPath) {
      const { seedPath } = options;
      const text = tryCatch(() => readFileSync(seedPath, 'utf8'), (e) => invalidSeed(seedPath, errorMessage(e)));
      if (!text.ok) {
        return text;
      }
      const seed = parseSeed(text.value, seedPath);
      if (!seed.ok) {
        return seed;
      }
      applySeed(context, seed.value);
    }

    if (options.role) {
      context.setUserRole(options.role);
    }
    context.stageInput(...options.inputs);

    const result = context.run(options.command, options.args);
    if (!result.ok) {
      return result;
    }

    const { stdout, stderr, exitCode, truncated } = result.value;
    ui.stdout(stdout);
    ui.stderr(stderr);

    if (truncated) {
      ui.warn(`Captured output exceeded ${context.config.maxCaptureBytes} bytes and was truncated`);
    }
    if (options.summary) {
      ui.note(
        [
          `Command:   ${[options.command, options.args].filter(Boolean).join(' ')}`,
          `Answers:   ${options.inputs.length}`,
          `Exit Code: ${ui.colorExitCode(exitCode)}`,
        ].join('\n'),
        ui.bold('Replay')
      );
    }
    return ok(exitCode);
  } finally {
    context.dispose();
  }
}

/**
 * Parse `run` arguments: the first positional is the command, later
 * positionals are joined into its argument string
 */
export function parseRunArgs(argv: readonly string[]): Result<RunOptions, string> {
  const positionals: string[] = [];
  const inputs: string[] = [];
  let role: string | undefined;
  let seedPath: string | undefined;
  let summary = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (arg === '--input' || arg === '-i') {
      if (next === undefined) {
        return err(`${arg} requires a value`);
      }
      inputs.push(next);
      i++;
    } else if (arg === '--role' || arg === '-r') {
      if (next === undefined || next.startsWith('-')) {
        return err(`${arg} requires a value`);
      }
      role = next;
      i++;
    } else if (arg === '--seed' || arg === '-s') {
      if (next === undefined || next.startsWith('-')) {
        return err(`${arg} requires a path`);
      }
      seedPath = next;
      i++;
    } else if (arg === '--summary') {
      summary = true;
    } else if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    } else if (arg.startsWith('-') && arg.length > 1) {
      return err(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  if (!command) {
    return err('Usage: run "<command>" [args] [--input <value>]...');
  }

  return ok({ command, args: rest.join(' '), inputs, role, seedPath, summary });
}

/**
 * Bootstrap and dependency injection
 * Wires the harness components into one test context per scenario
 */

import { randomUUID } from 'crypto';
import { Logger } from './core/interfaces.js';
import {
  HarnessConfiguration,
  HarnessConfigurationSchema,
  loadConfiguration,
} from './core/configuration.js';
import { Result, ok, err } from './core/result.js';
import { HarnessError, configurationError } from './core/errors.js';
import { FIFOInputQueue } from './implementations/input-queue.js';
import { BufferedStreamCapture } from './implementations/stream-capture.js';
import { InMemoryStateStore } from './implementations/state-store.js';
import { StructuredLogger, parseLogLevel } from './implementations/logger.js';
import { CommandRegistry } from './services/command-registry.js';
import { setupHandlers } from './services/handler-setup.js';
import { TestContext } from './services/test-context.js';

export interface TestContextOptions {
  /** Overrides applied on top of the environment configuration */
  readonly config?: Partial<HarnessConfiguration>;
  readonly logger?: Logger;
  readonly now?: () => number;
  readonly newId?: () => string;
  /** Replaces the default simulated tool */
  readonly registry?: CommandRegistry;
}

const resolveConfiguration = (
  overrides: Partial<HarnessConfiguration> | undefined
): Result<HarnessConfiguration, HarnessError> => {
  const base = loadConfiguration();
  if (!overrides) {
    return ok(base);
  }

  // An override left undefined keeps the environment's value
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = HarnessConfigurationSchema.safeParse({ ...base, ...defined });
  if (!parsed.success) {
    return err(configurationError('Invalid harness configuration', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    }));
  }
  return ok(parsed.data);
};

/**
 * Build a fresh test context
 * ARCHITECTURE: Returns Result instead of throwing
 */
export function createTestContext(options: TestContextOptions = {}): Result<TestContext, HarnessError> {
  const configResult = resolveConfiguration(options.config);
  if (!configResult.ok) {
    return configResult;
  }
  const config = configResult.value;

  const logger = options.logger ?? new StructuredLogger({}, parseLogLevel(config.logLevel));

  let registry = options.registry;
  if (!registry) {
    const registryResult = setupHandlers(config.toolName);
    if (!registryResult.ok) {
      return registryResult;
    }
    registry = registryResult.value;
  }

  logger.debug('Creating test context', { toolName: config.toolName });

  return ok(new TestContext({
    config,
    store: new InMemoryStateStore(),
    input: new FIFOInputQueue(),
    capture: new BufferedStreamCapture(config.maxCaptureBytes),
    registry,
    logger,
    now: options.now ?? Date.now,
    newId: options.newId ?? randomUUID,
  }));
}

/**
 * Run one scenario against a fresh context and dispose it afterwards,
 * whether the scenario returns or throws
 */
export function withScenario<T>(
  fn: (context: TestContext) => T,
  options: TestContextOptions = {}
): Result<T, HarnessError> {
  const contextResult = createTestContext(options);
  if (!contextResult.ok) {
    return contextResult;
  }

  const context = contextResult.value;
  try {
    return ok(fn(context));
  } finally {
    context.dispose();
  }
}

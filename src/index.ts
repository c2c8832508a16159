/**
 * Scripted CLI interaction harness
 * Public entry point for step definitions and test suites
 */

export { createTestContext, withScenario } from './bootstrap.js';
export type { TestContextOptions } from './bootstrap.js';
export { TestContext, DEFAULT_STATUS_CODE } from './services/test-context.js';
export { CommandDispatcher, parseCommand, exitCodeFor, openScope } from './services/command-dispatcher.js';
export type { ParsedCommand, DispatcherDependencies } from './services/command-dispatcher.js';
export { CommandRegistry } from './services/command-registry.js';
export { setupHandlers, SIMULATED_SUBCOMMANDS } from './services/handler-setup.js';
export { UpdateSession, EDITABLE_FIELDS, EXHAUSTED_SELECTION } from './services/handlers/update-handler.js';
export type { UpdateState, UpdateOutcome, EditableField } from './services/handlers/update-handler.js';

export { FIFOInputQueue } from './implementations/input-queue.js';
export {
  BufferedStreamCapture,
  BufferedOutputChannel,
  StagedInputChannel,
  WritableOutputChannel,
  DEFAULT_MAX_CAPTURE_BYTES,
} from './implementations/stream-capture.js';
export { InMemoryStateStore } from './implementations/state-store.js';
export { ServiceRegistry } from './implementations/service-registry.js';
export type { ServiceType } from './implementations/service-registry.js';
export { StructuredLogger, TestLogger, LogLevel, parseLogLevel } from './implementations/logger.js';

export * from './core/domain.js';
export * from './core/errors.js';
export * from './core/result.js';
export type * from './core/interfaces.js';
export { HarnessConfigurationSchema, loadConfiguration } from './core/configuration.js';
export type { HarnessConfiguration, LogLevelName } from './core/configuration.js';

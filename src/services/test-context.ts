/**
 * Test context
 * One instance per scenario. Owns the simulated state, the staged answers and
 * the capture resource, and records what the last command wrote.
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
import {
  ApiToken,
  ClientReport,
  CommandInvocationResult,
  ConfigValue,
  Project,
  Release,
  WebhookConfig,
  WorkItem,
  WorkItemCreateRequest,
  createWorkItem,
} from '../core/domain.js';
import { HarnessConfiguration } from '../core/configuration.js';
import { Result, err } from '../core/result.js';
import { ErrorCode, HarnessError, contextDisposed } from '../core/errors.js';
import { ServiceRegistry, ServiceType } from '../implementations/service-registry.js';
import { CommandDispatcher, openScope } from './command-dispatcher.js';
import { CommandRegistry } from './command-registry.js';

export interface TestContextDependencies {
  readonly config: HarnessConfiguration;
  readonly store: StateStore;
  readonly input: InputQueue;
  readonly capture: StreamCapture;
  readonly registry: CommandRegistry;
  readonly logger: Logger;
  readonly now: () => number;
  readonly newId: () => string;
}

export const DEFAULT_STATUS_CODE = 200;

export class TestContext implements CommandRunner {
  readonly config: HarnessConfiguration;
  readonly services = new ServiceRegistry();

  private readonly store: StateStore;
  private readonly input: InputQueue;
  private readonly capture: StreamCapture;
  private readonly dispatcher: CommandDispatcher;
  private readonly logger: Logger;
  private readonly clock: () => number;

  private lastException: Error | null = null;
  private statusCode = DEFAULT_STATUS_CODE;
  private lastResult: CommandInvocationResult | null = null;
  private userRole: string | null = null;
  private disposed = false;

  constructor(deps: TestContextDependencies) {
    this.config = deps.config;
    this.store = deps.store;
    this.input = deps.input;
    this.capture = deps.capture;
    this.clock = deps.now;
    this.logger = deps.logger.child({ module: 'TestContext' });
    this.dispatcher = new CommandDispatcher({
      registry: deps.registry,
      capture: deps.capture,
      input: deps.input,
      store: deps.store,
      logger: deps.logger,
      userRole: () => this.getUserRole(),
      now: deps.now,
      newId: deps.newId,
    });
  }

  // Command invocation

  /**
   * Run one command against this context's state
   * Staged answers are handed to the command and never outlive it.
   */
  run(command: string, args = ''): Result<CommandInvocationResult, HarnessError> {
    if (this.disposed) {
      return err(contextDisposed());
    }

    const result = this.dispatcher.run(command, args);
    if (result.ok) {
      this.lastResult = result.value;
    } else if (result.error.code === ErrorCode.HANDLER_FAILED) {
      this.lastException = result.error;
    }
    return result;
  }

  /**
   * Open a capture scope for output written outside a dispatched command
   */
  beginCapture(): Result<CaptureScope, HarnessError> {
    if (this.disposed) {
      return err(contextDisposed());
    }
    return openScope(this.capture, this.input);
  }

  endCapture(): Result<CapturedOutput, HarnessError> {
    return this.capture.end();
  }

  isCapturing(): boolean {
    return this.capture.isActive();
  }

  getLastCommandOutput(): string | null {
    return this.lastResult?.stdout ?? null;
  }

  getLastResult(): CommandInvocationResult | null {
    return this.lastResult;
  }

  // Staged input

  stageInput(...values: string[]): void {
    this.input.stage(...values);
  }

  nextInput(): string | null {
    return this.input.next();
  }

  pendingInput(): number {
    return this.input.size();
  }

  // Work items

  /**
   * Build a work item stamped with the context clock and save it
   */
  addWorkItem(key: string, request: WorkItemCreateRequest): WorkItem {
    const item = createWorkItem(request, this.clock());
    this.store.saveWorkItem(key, item);
    return item;
  }

  saveWorkItem(key: string, item: WorkItem): void {
    this.store.saveWorkItem(key, item);
  }

  getWorkItem(key: string): WorkItem | null {
    return this.store.getWorkItem(key);
  }

  findWorkItem(ref: string): WorkItem | null {
    return this.store.findWorkItem(ref);
  }

  listWorkItems(): readonly WorkItem[] {
    return this.store.listWorkItems();
  }

  saveWorkItemMetadata(ownerId: string, key: string, value: string): void {
    this.store.saveMetadata(ownerId, key, value);
  }

  getWorkItemMetadata(ownerId: string, key: string): string | null {
    return this.store.getMetadata(ownerId, key);
  }

  // Other entity families

  saveRelease(key: string, release: Release): void {
    this.store.saveRelease(key, release);
  }

  getRelease(key: string): Release | null {
    return this.store.getRelease(key);
  }

  saveProject(key: string, project: Project): void {
    this.store.saveProject(key, project);
  }

  getProject(key: string): Project | null {
    return this.store.getProject(key);
  }

  saveApiToken(key: string, token: ApiToken): void {
    this.store.saveApiToken(key, token);
  }

  getApiToken(key: string): ApiToken | null {
    return this.store.getApiToken(key);
  }

  saveWebhookConfig(key: string, config: WebhookConfig): void {
    this.store.saveWebhookConfig(key, config);
  }

  getWebhookConfig(key: string): WebhookConfig | null {
    return this.store.getWebhookConfig(key);
  }

  saveJsonPayload(key: string, payload: string): void {
    this.store.saveJsonPayload(key, payload);
  }

  getJsonPayload(key: string): string | null {
    return this.store.getJsonPayload(key);
  }

  saveClientReport(key: string, report: ClientReport): void {
    this.store.saveClientReport(key, report);
  }

  getClientReport(key: string): ClientReport | null {
    return this.store.getClientReport(key);
  }

  // Configuration values and flags

  setConfigValue(key: string, value: ConfigValue): void {
    this.store.setConfigValue(key, value);
  }

  getConfigValue(key: string): ConfigValue | null {
    return this.store.getConfigValue(key);
  }

  getConfigString(key: string): string | null {
    const value = this.store.getConfigValue(key);
    return value && (value.kind === 'string' || value.kind === 'identifier') ? value.value : null;
  }

  getConfigNumber(key: string): number | null {
    const value = this.store.getConfigValue(key);
    return value?.kind === 'number' ? value.value : null;
  }

  getConfigBoolean(key: string): boolean | null {
    const value = this.store.getConfigValue(key);
    return value?.kind === 'boolean' ? value.value : null;
  }

  setFlag(flag: string, enabled: boolean): void {
    this.store.setFlag(flag, enabled);
  }

  getFlag(flag: string): boolean {
    return this.store.getFlag(flag);
  }

  // Services

  registerService<T>(type: ServiceType<T>, instance: T): void {
    this.services.register(type, instance);
  }

  getService<T>(type: ServiceType<T>): T | null {
    return this.services.get(type);
  }

  // Scenario slots

  setException(error: Error | null): void {
    this.lastException = error;
  }

  getException(): Error | null {
    return this.lastException;
  }

  setStatusCode(code: number): void {
    this.statusCode = code;
  }

  getStatusCode(): number {
    return this.statusCode;
  }

  setUserRole(role: string | null): void {
    this.userRole = role;
  }

  getUserRole(): string {
    return this.userRole ?? this.config.defaultUserRole;
  }

  // Lifecycle

  isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Discard every piece of scenario state
   * Safe to call more than once; an open capture scope is closed and dropped.
   */
  dispose(): void {
    if (this.capture.isActive()) {
      const dropped = this.capture.end();
      if (dropped.ok) {
        this.logger.warn('Capture scope still open at dispose', {
          stdoutLength: dropped.value.stdout.length,
          stderrLength: dropped.value.stderr.length,
        });
      }
    }

    this.store.clear();
    this.input.clear();
    this.services.clear();
    this.lastException = null;
    this.statusCode = DEFAULT_STATUS_CODE;
    this.lastResult = null;
    this.userRole = null;

    if (!this.disposed) {
      this.logger.debug('Test context disposed');
    }
    this.disposed = true;
  }
}

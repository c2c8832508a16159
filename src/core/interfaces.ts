/**
 * Core interfaces for dependency injection
 * Handlers and the test context see collaborators only through these
 */

import type { Readable } from 'stream';
import { Result } from './result.js';
import { HarnessError } from './errors.js';
import {
  ApiToken,
  ClientReport,
  CommandInvocationResult,
  ConfigValue,
  Project,
  Release,
  WebhookConfig,
  WorkItem,
} from './domain.js';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Staged answers for interactive commands, consumed front to back
 */
export interface InputQueue {
  stage(...values: string[]): void;
  /** Next answer, or null when nothing is staged. Never waits. */
  next(): string | null;
  peek(): string | null;
  drain(): readonly string[];
  size(): number;
  isEmpty(): boolean;
  clear(): void;
}

/**
 * Line-oriented writer standing in for a standard output channel
 */
export interface OutputChannel {
  print(text: string): void;
  println(text?: string): void;
}

/**
 * Answers available to the running command
 */
export interface InputChannel {
  /** Staged answers newline-joined, in staging order */
  readonly text: string;
  /** Next unread answer, or null once exhausted */
  readLine(): string | null;
  /** Unread answers as a byte stream */
  asStream(): Readable;
}

export interface CaptureScope {
  readonly out: OutputChannel;
  readonly err: OutputChannel;
  readonly input: InputChannel;
}

export interface CapturedOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly truncated: boolean;
}

/**
 * Scoped, non-reentrant capture of one command's channels
 */
export interface StreamCapture {
  begin(input: readonly string[]): Result<CaptureScope, HarnessError>;
  end(): Result<CapturedOutput, HarnessError>;
  isActive(): boolean;
  /** Open scope, or channels bound to the real process streams */
  current(): CaptureScope;
}

/**
 * Simulated application state for one scenario
 * get*() returns null for a missing key; save*() overwrites
 */
export interface StateStore {
  saveWorkItem(key: string, item: WorkItem): void;
  getWorkItem(key: string): WorkItem | null;
  /** Resolve by work item id first, then by key */
  findWorkItem(ref: string): WorkItem | null;
  /** Store a new version under every key that holds this id */
  replaceWorkItem(item: WorkItem): void;
  listWorkItems(): readonly WorkItem[];
  workItemKeys(): readonly string[];

  saveRelease(key: string, release: Release): void;
  getRelease(key: string): Release | null;
  saveProject(key: string, project: Project): void;
  getProject(key: string): Project | null;
  saveApiToken(key: string, token: ApiToken): void;
  getApiToken(key: string): ApiToken | null;
  saveWebhookConfig(key: string, config: WebhookConfig): void;
  getWebhookConfig(key: string): WebhookConfig | null;
  saveJsonPayload(key: string, payload: string): void;
  getJsonPayload(key: string): string | null;
  saveClientReport(key: string, report: ClientReport): void;
  getClientReport(key: string): ClientReport | null;

  saveMetadata(ownerId: string, key: string, value: string): void;
  getMetadata(ownerId: string, key: string): string | null;
  listMetadata(ownerId: string): ReadonlyArray<readonly [string, string]>;

  setConfigValue(key: string, value: ConfigValue): void;
  getConfigValue(key: string): ConfigValue | null;
  setFlag(flag: string, enabled: boolean): void;
  getFlag(flag: string): boolean;

  clear(): void;
}

/**
 * Everything a simulated handler may touch during one invocation
 */
export interface CommandInvocation {
  readonly family: string;
  readonly subcommand: string;
  /** Flat argument string, verbatim */
  readonly args: string;
  readonly io: CaptureScope;
  readonly store: StateStore;
  readonly userRole: string;
  readonly now: () => number;
  readonly newId: () => string;
  readonly logger: Logger;
}

export type CommandHandler = (invocation: CommandInvocation) => void;

/**
 * Command dispatch surface used by step definitions
 */
export interface CommandRunner {
  run(command: string, args?: string): Result<CommandInvocationResult, HarnessError>;
}

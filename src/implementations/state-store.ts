/**
 * In-memory state store for one scenario
 * Every map is owned by a single instance; nothing is static or shared
 */

import { StateStore } from '../core/interfaces.js';
import {
  ApiToken,
  ClientReport,
  ConfigValue,
  Project,
  Release,
  WebhookConfig,
  WorkItem,
} from '../core/domain.js';

export class InMemoryStateStore implements StateStore {
  private readonly workItems = new Map<string, WorkItem>();
  private readonly releases = new Map<string, Release>();
  private readonly projects = new Map<string, Project>();
  private readonly apiTokens = new Map<string, ApiToken>();
  private readonly webhookConfigs = new Map<string, WebhookConfig>();
  private readonly jsonPayloads = new Map<string, string>();
  private readonly clientReports = new Map<string, ClientReport>();
  private readonly metadata = new Map<string, Map<string, string>>();
  private readonly configValues = new Map<string, ConfigValue>();
  private readonly flags = new Set<string>();

  saveWorkItem(key: string, item: WorkItem): void {
    this.workItems.set(key, item);
  }

  getWorkItem(key: string): WorkItem | null {
    return this.workItems.get(key) ?? null;
  }

  findWorkItem(ref: string): WorkItem | null {
    for (const item of this.workItems.values()) {
      if (item.id === ref) {
        return item;
      }
    }
    return this.getWorkItem(ref);
  }

  replaceWorkItem(item: WorkItem): void {
    let stored = false;
    for (const [key, existing] of this.workItems) {
      if (existing.id === item.id) {
        this.workItems.set(key, item);
        stored = true;
      }
    }
    if (!stored) {
      this.workItems.set(item.id, item);
    }
  }

  listWorkItems(): readonly WorkItem[] {
    // Several keys may alias one item; list each id once, in first-saved order
    const seen = new Map<string, WorkItem>();
    for (const item of this.workItems.values()) {
      if (!seen.has(item.id)) {
        seen.set(item.id, item);
      }
    }
    return Object.freeze([...seen.values()]);
  }

  workItemKeys(): readonly string[] {
    return Object.freeze([...this.workItems.keys()]);
  }

  saveRelease(key: string, release: Release): void {
    this.releases.set(key, release);
  }

  getRelease(key: string): Release | null {
    return this.releases.get(key) ?? null;
  }

  saveProject(key: string, project: Project): void {
    this.projects.set(key, project);
  }

  getProject(key: string): Project | null {
    return this.projects.get(key) ?? null;
  }

  saveApiToken(key: string, token: ApiToken): void {
    this.apiTokens.set(key, token);
  }

  getApiToken(key: string): ApiToken | null {
    return this.apiTokens.get(key) ?? null;
  }

  saveWebhookConfig(key: string, config: WebhookConfig): void {
    this.webhookConfigs.set(key, config);
  }

  getWebhookConfig(key: string): WebhookConfig | null {
    return this.webhookConfigs.get(key) ?? null;
  }

  saveJsonPayload(key: string, payload: string): void {
    this.jsonPayloads.set(key, payload);
  }

  getJsonPayload(key: string): string | null {
    return this.jsonPayloads.get(key) ?? null;
  }

  saveClientReport(key: string, report: ClientReport): void {
    this.clientReports.set(key, Object.freeze({ ...report }));
  }

  getClientReport(key: string): ClientReport | null {
    return this.clientReports.get(key) ?? null;
  }

  saveMetadata(ownerId: string, key: string, value: string): void {
    let entries = this.metadata.get(ownerId);
    if (!entries) {
      entries = new Map<string, string>();
      this.metadata.set(ownerId, entries);
    }
    entries.set(key, value);
  }

  getMetadata(ownerId: string, key: string): string | null {
    return this.metadata.get(ownerId)?.get(key) ?? null;
  }

  listMetadata(ownerId: string): ReadonlyArray<readonly [string, string]> {
    const entries = this.metadata.get(ownerId);
    return entries ? Object.freeze([...entries.entries()]) : Object.freeze([]);
  }

  setConfigValue(key: string, value: ConfigValue): void {
    this.configValues.set(key, value);
  }

  getConfigValue(key: string): ConfigValue | null {
    return this.configValues.get(key) ?? null;
  }

  setFlag(flag: string, enabled: boolean): void {
    if (enabled) {
      this.flags.add(flag);
    } else {
      this.flags.delete(flag);
    }
  }

  getFlag(flag: string): boolean {
    return this.flags.has(flag);
  }

  clear(): void {
    this.workItems.clear();
    this.releases.clear();
    this.projects.clear();
    this.apiTokens.clear();
    this.webhookConfigs.clear();
    this.jsonPayloads.clear();
    this.clientReports.clear();
    this.metadata.clear();
    this.configValues.clear();
    this.flags.clear();
  }
}

/**
 * Registry of collaborator services for one scenario
 * Keyed by the capability's class, so lookups narrow without casts
 */

export type ServiceType<T> = new (...args: never[]) => T;

export class ServiceRegistry {
  private readonly services = new Map<ServiceType<unknown>, unknown>();

  /**
   * Register an implementation; a later registration replaces the earlier one
   */
  register<T>(type: ServiceType<T>, instance: T): void {
    this.services.set(type, instance);
  }

  get<T>(type: ServiceType<T>): T | null {
    const instance = this.services.get(type);
    return instance instanceof type ? instance : null;
  }

  has(type: ServiceType<unknown>): boolean {
    return this.services.has(type);
  }

  clear(): void {
    this.services.clear();
  }
}

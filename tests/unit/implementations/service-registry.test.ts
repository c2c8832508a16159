import { describe, it, expect } from 'vitest';
import { ServiceRegistry } from '../../../src/implementations/service-registry.js';

class Mailer {
  readonly sent: string[] = [];
  send(to: string): void {
    this.sent.push(to);
  }
}

class FakeMailer extends Mailer {}

class Clock {
  constructor(readonly now: number) {}
}

describe('ServiceRegistry', () => {
  it('should resolve a registered instance by its capability type', () => {
    const registry = new ServiceRegistry();
    const mailer = new Mailer();
    registry.register(Mailer, mailer);

    expect(registry.get(Mailer)).toBe(mailer);
    expect(registry.has(Mailer)).toBe(true);
  });

  it('should accept a subclass as the implementation', () => {
    const registry = new ServiceRegistry();
    const fake = new FakeMailer();
    registry.register(Mailer, fake);

    registry.get(Mailer)?.send('qa@example.test');
    expect(fake.sent).toEqual(['qa@example.test']);
  });

  it('should answer null for an unregistered type', () => {
    const registry = new ServiceRegistry();
    registry.register(Clock, new Clock(5));

    expect(registry.get(Mailer)).toBeNull();
    expect(registry.has(Mailer)).toBe(false);
  });

  it('should drop every registration on clear', () => {
    const registry = new ServiceRegistry();
    registry.register(Clock, new Clock(5));
    registry.clear();

    expect(registry.get(Clock)).toBeNull();
  });
});

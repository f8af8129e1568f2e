import type { WorkerConfig, WorkerHandle } from './handle.js';
import type { ServiceConfig } from '../config/schema.js';
import { HttpWorkerHandle } from './bindings/http.js';

export type HandleFactory = (config: WorkerConfig) => WorkerHandle;

export const DEFAULT_BINDING = 'http';

export class UnknownBindingError extends Error {
  constructor(public readonly binding: string) {
    super(`Unknown worker binding: ${binding}`);
    this.name = 'UnknownBindingError';
  }
}

/** Maps binding names to handle factories */
export class HandleRegistry {
  private factories = new Map<string, HandleFactory>();

  register(binding: string, factory: HandleFactory): void {
    this.factories.set(binding, factory);
  }

  has(binding: string): boolean {
    return this.factories.has(binding);
  }

  bindings(): string[] {
    return Array.from(this.factories.keys());
  }

  create(config: WorkerConfig): WorkerHandle {
    const binding = config.binding ?? DEFAULT_BINDING;
    const factory = this.factories.get(binding);
    if (!factory) {
      throw new UnknownBindingError(binding);
    }
    return factory(config);
  }
}

/** Registry with the built-in http binding wired to the service config */
export function createDefaultRegistry(service: ServiceConfig, fetchImpl?: typeof fetch): HandleRegistry {
  const registry = new HandleRegistry();
  registry.register('http', config => new HttpWorkerHandle(config, {
    apiBase: service.apiBase,
    targetChatId: service.targetChatId,
    requestTimeoutMs: service.requestTimeoutMs,
    fetchImpl,
  }));
  return registry;
}

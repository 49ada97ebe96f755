/**
 * ServiceRegistry - Typed Service Container
 *
 * Central registry for process-wide services. Library code never requires
 * it: getLog() falls back to a stderr logger when nothing is registered.
 *
 * Usage:
 *   import { initServiceRegistry, Services, createLogService } from '@fireside/core';
 *   initServiceRegistry().register(Services.Log, createLogService({ level: 'debug' }));
 */

// ============================================================================
// ServiceToken
// ============================================================================

/**
 * Typed key for service registration and retrieval.
 * The generic parameter T ensures type safety at get/set time.
 */
export class ServiceToken<T> {
  /** @internal Brand field to preserve generic type information */
  declare readonly _type: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

// ============================================================================
// ServiceRegistry
// ============================================================================

export class ServiceRegistry {
  private readonly instances = new Map<string, unknown>();

  /**
   * Register a service instance, replacing any previous one.
   */
  register<T>(token: ServiceToken<T>, instance: T): void {
    this.instances.set(token.name, instance);
  }

  /**
   * Get a registered service. Throws if not found.
   */
  get<T>(token: ServiceToken<T>): T {
    if (!this.instances.has(token.name)) {
      throw new Error(
        `Service '${token.name}' not registered. ` +
        `Make sure it is registered during startup before use.`
      );
    }
    return this.instances.get(token.name) as T;
  }

  /**
   * Get a registered service, or null if not found.
   */
  tryGet<T>(token: ServiceToken<T>): T | null {
    return this.instances.has(token.name) ? this.get(token) : null;
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.instances.has(token.name);
  }

  clear(): void {
    this.instances.clear();
  }
}

// ============================================================================
// Singleton Access
// ============================================================================

let _registry: ServiceRegistry | null = null;

/**
 * Initialize the global ServiceRegistry.
 * Call once during application startup, before registering services.
 */
export function initServiceRegistry(): ServiceRegistry {
  if (_registry) {
    throw new Error(
      'ServiceRegistry already initialized. Call resetServiceRegistry() first if re-initializing.'
    );
  }
  _registry = new ServiceRegistry();
  return _registry;
}

/**
 * Get the global ServiceRegistry.
 * Throws if not initialized.
 */
export function getServiceRegistry(): ServiceRegistry {
  if (!_registry) {
    throw new Error(
      'ServiceRegistry not initialized. Call initServiceRegistry() during startup.'
    );
  }
  return _registry;
}

export function hasServiceRegistry(): boolean {
  return _registry !== null;
}

/**
 * Reset the global ServiceRegistry (for testing).
 */
export function resetServiceRegistry(): void {
  _registry?.clear();
  _registry = null;
}

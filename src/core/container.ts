/**
 * @fileoverview Dependency injection container for service registration and resolution.
 *
 * Provides a typed, Symbol-based dependency injection container that supports
 * singleton registration, lazy initialization, and scoped containers.
 *
 * @module core/container
 */

/**
 * A Symbol-backed token that remembers the type of the service it names.
 * The type parameter only exists at compile time.
 */
export interface ServiceToken<T> {
  readonly key: symbol;
  /** Phantom field carrying `T`; never set at runtime. */
  readonly __type?: T;
}

/** Create a token for a service of type `T`. */
export function createToken<T>(description: string): ServiceToken<T> {
  return { key: Symbol(description) };
}

/** Factory function type for creating service instances. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

/** Service registration information. */
interface ServiceRegistration<T> {
  factory: ServiceFactory<T>;
  isSingleton: boolean;
  instance?: { value: T };
}

/**
 * Registrations keyed by token. Each entry is stored and read back through
 * the same token, which keeps the service type intact.
 */
class RegistrationMap {
  private readonly entries = new Map<symbol, unknown>();

  set<T>(token: ServiceToken<T>, registration: ServiceRegistration<T>): void {
    this.entries.set(token.key, registration);
  }

  get<T>(token: ServiceToken<T>): ServiceRegistration<T> | undefined {
    const entry = this.entries.get(token.key);
    return isRegistration<T>(entry) ? entry : undefined;
  }

  has(token: ServiceToken<unknown>): boolean {
    return this.entries.has(token.key);
  }
}

function isRegistration<T>(entry: unknown): entry is ServiceRegistration<T> {
  return typeof entry === 'object' && entry !== null && 'factory' in entry;
}

/**
 * Dependency injection container with Symbol-based type safety.
 *
 * Supports service registration, lazy initialization, singleton pattern,
 * and scoped containers that inherit from parent containers.
 */
export class ServiceContainer {
  private readonly services = new RegistrationMap();
  private readonly parent?: ServiceContainer;

  constructor(parent?: ServiceContainer) {
    this.parent = parent;
  }

  /**
   * Register a service factory. Creates a new instance on each resolve() call.
   */
  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void {
    this.services.set(token, { factory, isSingleton: false });
  }

  /**
   * Register a singleton service factory. Creates only one instance, cached after first resolve().
   */
  registerSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void {
    this.services.set(token, { factory, isSingleton: true });
  }

  /**
   * Register an already-built instance.
   */
  registerInstance<T>(token: ServiceToken<T>, value: T): void {
    this.services.set(token, { factory: () => value, isSingleton: true, instance: { value } });
  }

  /**
   * Resolve a service instance.
   *
   * For regular services, creates a new instance each time.
   * For singletons, returns the cached instance or creates it on first call.
   */
  resolve<T>(token: ServiceToken<T>): T {
    const registration = this.services.get(token);
    if (registration) {
      return this.createInstance(registration);
    }

    if (this.parent) {
      return this.parent.resolve(token);
    }

    throw new Error(`Service not registered: ${token.key.toString()}`);
  }

  /**
   * Create a scoped child container.
   *
   * The child inherits all parent registrations and can override them.
   */
  createScope(): ServiceContainer {
    return new ServiceContainer(this);
  }

  /**
   * Check if a service is registered in this container or its parents.
   */
  isRegistered(token: ServiceToken<unknown>): boolean {
    return this.services.has(token) || (this.parent?.isRegistered(token) ?? false);
  }

  private createInstance<T>(registration: ServiceRegistration<T>): T {
    if (registration.isSingleton && registration.instance) {
      return registration.instance.value;
    }

    const value = registration.factory(this);

    if (registration.isSingleton) {
      registration.instance = { value };
    }

    return value;
  }
}

/**
 * Dependency Injection Container
 *
 * Keyed by the registry interface `R`, so every token resolves to its declared type.
 */

type Factory<T> = () => T;

interface Registration<T> {
  singleton: boolean;
  instance?: { value: T };
  factory: Factory<T>;
}

type Registrations<R> = { [K in keyof R]?: Registration<R[K]> };

export class Container<R extends object> {
  private registrations: Registrations<R> = {};

  /**
   * Register a factory. Singletons (the default) are created on first resolve.
   */
  register<K extends keyof R>(token: K, factory: Factory<R[K]>, options: { singleton?: boolean } = {}): this {
    this.registrations[token] = {
      singleton: options.singleton ?? true,
      factory,
    };
    return this;
  }

  registerInstance<K extends keyof R>(token: K, instance: R[K]): this {
    this.registrations[token] = {
      singleton: true,
      instance: { value: instance },
      factory: () => instance,
    };
    return this;
  }

  resolve<K extends keyof R>(token: K): R[K] {
    const registration = this.registrations[token];
    if (!registration) {
      throw new Error(`No registration found for token: ${String(token)}`);
    }

    // Singleton checker
    if (registration.instance) {
      return registration.instance.value;
    }

    const value = registration.factory();
    if (registration.singleton) {
      registration.instance = { value };
    }

    return value;
  }

  has(token: keyof R): boolean {
    return this.registrations[token] !== undefined;
  }

  clear(): void {
    this.registrations = {};
  }
}

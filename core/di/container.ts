/**
 * A typed key. The phantom `type` field lets `resolve(token)` infer the
 * service type without an explicit type argument.
 */
export interface Token<T> {
  readonly key: symbol;
  readonly type?: T;
}

export function createToken<T>(description: string): Token<T> {
  return { key: Symbol(description) };
}

type Factory<T> = (container: Container) => T;

interface Provider<T> {
  factory: Factory<T>;
  singleton: boolean;
}

export class Container {
  private readonly providers = new Map<symbol, Provider<unknown>>();
  private readonly singletons = new Map<symbol, unknown>();

  register<T>(token: Token<T>, factory: Factory<T>, options?: { singleton?: boolean }): void {
    if (typeof token?.key !== 'symbol') {
      throw new Error('Token must be created with createToken');
    }

    this.providers.set(token.key, {
      factory,
      singleton: options?.singleton ?? false
    });
    this.singletons.delete(token.key);
  }

  registerValue<T>(token: Token<T>, value: T): void {
    this.register(token, () => value, { singleton: true });
    this.singletons.set(token.key, value);
  }

  has<T>(token: Token<T>): boolean {
    return this.providers.has(token.key);
  }

  resolve<T>(token: Token<T>): T {
    const provider = this.providers.get(token.key);
    if (!provider) {
      throw new Error(`No provider registered for token: ${String(token.key.description)}`);
    }

    if (provider.singleton) {
      if (this.singletons.has(token.key)) {
        return this.singletons.get(token.key) as T;
      }

      const instance = provider.factory(this) as T;
      this.singletons.set(token.key, instance);
      return instance;
    }

    return provider.factory(this) as T;
  }
}

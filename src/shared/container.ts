import { isInjectable, getInjectedParams } from './decorators';

export type Constructor<T> = new (...args: any[]) => T;
export type Token<T = unknown> = string | Constructor<T>;
type FactoryFunction<T> = () => T;

interface Binding {
  factory: FactoryFunction<unknown>;
  singleton: boolean;
  instance?: unknown;
}

export class DIContainer {
  private bindings: Map<Token, Binding> = new Map();
  private static instance: DIContainer | undefined;

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  bind<T>(token: Token<T>, factory: FactoryFunction<T>, singleton: boolean = true): void {
    this.bindings.set(token, { factory, singleton });
  }

  /**
   * Binds a class whose constructor parameters are all marked with `@Inject(token)`.
   */
  bindClass<T>(token: Token<T>, constructor: Constructor<T>, singleton: boolean = true): void {
    this.bind(
      token,
      () => {
        const params = getInjectedParams(constructor);
        if (params.length !== constructor.length) {
          throw new Error(
            `${constructor.name} has ${constructor.length} constructor parameters but ${params.length} @Inject tokens`,
          );
        }
        const args = params.map(({ token: paramToken }) => this.get(paramToken));
        return new constructor(...args);
      },
      singleton,
    );
  }

  get<T>(token: Token<T>): T {
    const binding = this.bindings.get(token);

    if (!binding) {
      // Auto-register injectable classes
      if (typeof token === 'function' && isInjectable(token)) {
        this.bindClass(token, token);
        return this.get(token);
      }
      throw new Error(`No binding found for token: ${describeToken(token)}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      // The binding map is keyed by token; bind<T> guarantees the factory yields T.
      return binding.instance as T;
    }

    const instance = binding.factory();

    if (binding.singleton) {
      binding.instance = instance;
    }

    return instance as T;
  }
}

function describeToken(token: Token): string {
  return typeof token === 'string' ? token : token.name;
}


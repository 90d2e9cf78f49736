import type { Container, ServiceIdentifier } from 'inversify';

// Constructor arguments are supplied by the container, so their types are open here.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Newable<T> = new (...args: any[]) => T;

/**
 * Bind a concrete class to itself (auto DI resolution)
 */
export function bindSelf<T>(container: Container, impl: Newable<T>) {
  container.bind<T>(impl).toSelf().inSingletonScope();
}

/**
 * Bind a class that must be constructed anew on every resolution
 */
export function bindTransient<T>(container: Container, impl: Newable<T>) {
  container.bind<T>(impl).toSelf().inTransientScope();
}

/**
 * Bind a token (interface or string) to a concrete implementation
 */
export function bindTo<T>(container: Container, token: ServiceIdentifier<T>, impl: Newable<T>) {
  container.bind<T>(token).to(impl).inSingletonScope();
}

/**
 * Bind a constant value to a token (for collaborators, configs, strings, etc)
 */
export function bindConstant<T>(container: Container, token: ServiceIdentifier<T>, value: T) {
  container.bind<T>(token).toConstantValue(value);
}

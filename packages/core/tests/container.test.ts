import { describe, it, expect } from 'vitest';
import { injectable, decorate } from 'inversify';
import { createContainer } from '../src/di/Container';
import { bindConstant, bindSelf, bindTo, bindTransient } from '../src/di/Binding';
import { Service, Use } from '../src/decorators/Service';

class Foo {}
// Apply @injectable() decorator before binding
decorate(injectable(), Foo);

const GREETING = Symbol.for('Greeting');

@Service()
class Greeter {
  constructor(@Use(GREETING) readonly greeting: string) {}
}

describe('container singleton', () => {
  it('returns same instance', () => {
    const container = createContainer();
    bindSelf(container, Foo);

    const a = container.get(Foo);
    const b = container.get(Foo);
    expect(a).toBe(b);
  });

  it('keeps bindings per container', () => {
    const first = createContainer();
    const second = createContainer();
    bindSelf(first, Foo);

    expect(first.isBound(Foo)).toBe(true);
    expect(second.isBound(Foo)).toBe(false);
  });

  it('binds a token to an implementation once', () => {
    const container = createContainer();
    const FOO = Symbol.for('Foo');
    bindTo(container, FOO, Foo);

    expect(container.get(FOO)).toBeInstanceOf(Foo);
    expect(container.get(FOO)).toBe(container.get(FOO));
  });
});

describe('constructor injection', () => {
  it('injects constants through @Use tokens', () => {
    const container = createContainer();
    bindConstant(container, GREETING, 'hello');
    bindTransient(container, Greeter);

    expect(container.get(Greeter).greeting).toBe('hello');
  });

  it('creates a new instance for transient bindings', () => {
    const container = createContainer();
    bindConstant(container, GREETING, 'hi');
    bindTransient(container, Greeter);

    expect(container.get(Greeter)).not.toBe(container.get(Greeter));
  });
});

/**
 * @fileoverview Unit tests for ServiceContainer
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import { ServiceContainer, createToken } from '../../../core/container';

interface Counter {
  id: number;
}

interface Greeter {
  greet(): string;
}

const CounterToken = createToken<Counter>('Counter');
const GreeterToken = createToken<Greeter>('Greeter');
const MissingToken = createToken<string>('Missing');

suite('ServiceContainer', () => {
  let container: ServiceContainer;
  let created: number;

  setup(() => {
    container = new ServiceContainer();
    created = 0;
  });

  test('register creates a new instance per resolve', () => {
    container.register(CounterToken, () => ({ id: ++created }));

    assert.strictEqual(container.resolve(CounterToken).id, 1);
    assert.strictEqual(container.resolve(CounterToken).id, 2);
  });

  test('registerSingleton creates one instance lazily', () => {
    container.registerSingleton(CounterToken, () => ({ id: ++created }));
    assert.strictEqual(created, 0);

    const first = container.resolve(CounterToken);
    assert.strictEqual(container.resolve(CounterToken), first);
    assert.strictEqual(created, 1);
  });

  test('registerInstance returns the given value', () => {
    const counter = { id: 42 };
    container.registerInstance(CounterToken, counter);
    assert.strictEqual(container.resolve(CounterToken), counter);
  });

  test('factories resolve their dependencies', () => {
    container.registerInstance(CounterToken, { id: 7 });
    container.registerSingleton(GreeterToken, c => {
      const counter = c.resolve(CounterToken);
      return { greet: () => `counter ${counter.id}` };
    });

    assert.strictEqual(container.resolve(GreeterToken).greet(), 'counter 7');
  });

  test('throws for an unregistered token', () => {
    assert.throws(() => container.resolve(MissingToken), /Service not registered: Symbol\(Missing\)/);
    assert.ok(!container.isRegistered(MissingToken));
  });

  test('scopes inherit and override', () => {
    container.registerInstance(CounterToken, { id: 1 });
    const scope = container.createScope();

    assert.ok(scope.isRegistered(CounterToken));
    assert.strictEqual(scope.resolve(CounterToken).id, 1);

    scope.registerInstance(CounterToken, { id: 2 });
    assert.strictEqual(scope.resolve(CounterToken).id, 2);
    assert.strictEqual(container.resolve(CounterToken).id, 1);
  });
});

import test from 'node:test';
import assert from 'node:assert/strict';
import { EventBus } from './eventBus.js';

test('emit: subscribers see events in order until they unsubscribe', () => {
  const bus = new EventBus<number>();
  const seen: number[] = [];
  const off = bus.subscribe(n => seen.push(n));

  bus.emit(1);
  bus.emit(2);
  off();
  bus.emit(3);

  assert.deepEqual(seen, [1, 2]);
  assert.equal(bus.size, 0);
});

test('emit: a failing subscriber is reported and the rest still run', () => {
  const errors: unknown[] = [];
  const bus = new EventBus<string>(err => errors.push(err));
  const seen: string[] = [];
  bus.subscribe(() => {
    throw new Error('boom');
  });
  bus.subscribe(s => seen.push(s));

  bus.emit('death');

  assert.deepEqual(seen, ['death']);
  assert.equal(errors.length, 1);
  assert.equal(errors[0] instanceof Error ? errors[0].message : '', 'boom');
});

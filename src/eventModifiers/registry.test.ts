import test from 'node:test';
import assert from 'node:assert/strict';
import { buildEventRegistry, EVENT_SETUP_ORDER, type EventSettings } from './index.js';
import { EventRegistry } from './registry.js';
import { JesterEvent } from './jester.js';
import { PriestEvent } from './priest.js';
import { LoversEvent } from './lovers.js';
import { DrunkEvent } from './drunk.js';
import { GunNutEvent } from './gunNut.js';
import { BodyguardEvent } from './bodyguard.js';
import { EventTogglesSchema } from '../types.js';
import { seatTable } from '../testing/fakes.js';
import { modifierEffect } from '../effects/types.js';

function village() {
  return seatTable(
    [
      ['Alice', 'assassin'],
      ['Bob', 'villager'],
      ['Carol', 'villager'],
      ['Dave', 'villager'],
    ],
    1,
    () => 0
  );
}

function settings(overrides: Partial<EventSettings> = {}): EventSettings {
  return {
    events: EventTogglesSchema.parse({}),
    chaos: false,
    random_events: false,
    event_probability: 0.1,
    ...overrides,
  };
}

test('events run setup in the fixed order regardless of registration order', () => {
  const registry = new EventRegistry();
  registry.register(new PriestEvent());
  registry.register(new JesterEvent());
  assert.deepEqual(registry.kinds, ['jester', 'priest']);
});

test('registering the same kind twice keeps the first', () => {
  const registry = new EventRegistry();
  const first = new DrunkEvent();
  registry.register(first);
  registry.register(new DrunkEvent());
  assert.equal(registry.active.length, 1);
  assert.equal(registry.active[0], first);
});

test('a claimed player is not offered to later events', () => {
  const view = village();
  const registry = new EventRegistry();
  registry.register(new JesterEvent());
  registry.register(new PriestEvent());
  registry.setupAll(view, effects => view.apply(effects));

  assert.equal(view.player('Bob')?.hasModifier('jester'), true);
  assert.equal(view.player('Carol')?.hasModifier('priest'), true);
  assert.equal(view.player('Alice')?.modifiers.length, 0);
});

test('lovers ignore the claimed set and may pair anyone', () => {
  const view = village();
  const registry = new EventRegistry();
  registry.register(new JesterEvent());
  registry.register(new LoversEvent());
  registry.setupAll(view, effects => view.apply(effects));

  assert.equal(view.player('Bob')?.hasModifier('jester'), true);
  assert.equal(view.player('Bob')?.getModifier('lover')?.str('partner'), 'Carol');
  assert.equal(view.player('Carol')?.getModifier('lover')?.str('partner'), 'Bob');
});

test('a per-event eligibility filter narrows the pool', () => {
  const view = village();
  const registry = new EventRegistry();
  registry.register(new JesterEvent({ eligibility: p => p.name !== 'Bob' }));
  registry.setupAll(view, effects => view.apply(effects));
  assert.equal(view.player('Carol')?.hasModifier('jester'), true);
  assert.equal(view.player('Bob')?.hasModifier('jester'), false);
});

test('an empty pool produces no effects', () => {
  const view = seatTable([['Alice', 'assassin'], ['Bob', 'assassin']], 1, () => 0);
  const registry = new EventRegistry();
  registry.register(new PriestEvent());
  registry.setupAll(view, effects => assert.deepEqual(effects, []));
});

test('chaos registers every event in setup order', () => {
  const registry = buildEventRegistry(settings({ chaos: true }), () => 0.99);
  assert.deepEqual(registry.kinds, [...EVENT_SETUP_ORDER]);
});

test('explicitly enabled events always activate; others stay off without random mode', () => {
  const registry = buildEventRegistry(settings({ events: EventTogglesSchema.parse({ drunk: true }) }), () => 0);
  assert.deepEqual(registry.kinds, ['drunk']);
});

test('random mode rolls each event against its probability', () => {
  const all = buildEventRegistry(settings({ random_events: true }), () => 0);
  assert.equal(all.kinds.length, EVENT_SETUP_ORDER.length);

  const none = buildEventRegistry(settings({ random_events: true }), () => 0.5);
  assert.deepEqual(none.kinds, []);

  const forcedOnly = buildEventRegistry(
    settings({ random_events: true, events: EventTogglesSchema.parse({ ghost: true }) }),
    () => 0.5
  );
  assert.deepEqual(forcedOnly.kinds, ['ghost']);
});

test('redirectVote passes through when no event redirects', () => {
  const view = village();
  const registry = new EventRegistry();
  registry.register(new DrunkEvent());
  assert.equal(registry.redirectVote(view, 'Bob', 'Alice'), undefined);
});

test('counter-attack is consulted before anything else and the first hit wins', () => {
  const view = village();
  view.apply([modifierEffect('Dave', 'gun_nut', 'test')]);
  const registry = new EventRegistry();
  registry.register(new BodyguardEvent());
  registry.register(new GunNutEvent());

  const hit = registry.counterAttack(view, {
    source: 'assassins',
    attackers: ['Alice'],
    target: 'Dave',
    protectable: true,
    onHit: [],
  });
  assert.equal(hit?.outcome, 'countered');
  assert.equal(hit?.effects[0]?.type, 'counter_kill');
  assert.equal(hit?.effects[0]?.target, 'Alice');
});

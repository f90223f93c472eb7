import test from 'node:test';
import assert from 'node:assert/strict';
import { describeInvestigation, investigate, pluralityTarget, resolveAttack } from './resolver.js';
import type { AttackInterceptors } from './types.js';
import { EventRegistry } from '../eventModifiers/registry.js';
import { BodyguardEvent } from '../eventModifiers/bodyguard.js';
import { GunNutEvent } from '../eventModifiers/gunNut.js';
import { deathEffect, modifierEffect, type Effect } from '../effects/types.js';
import { seatTable } from '../testing/fakes.js';
import type { NightAttack } from '../eventModifiers/base.js';

// --- Helpers ---

const nightKill = (target: string): Effect => ({ type: 'night_kill', target, source: 'role:assassin', killer: 'assassins' });

const assassinate = (target: string): NightAttack => ({
  source: 'assassins',
  attackers: ['Mal'],
  target,
  protectable: true,
  onHit: [nightKill(target)],
});

const zombieBite = (target: string): NightAttack => ({
  source: 'zombie',
  attackers: ['Zed'],
  target,
  protectable: false,
  onHit: [{ type: 'zombie_kill', target, source: 'event:zombie', zombie: 'Zed' }],
});

function interceptors(...events: Array<GunNutEvent | BodyguardEvent>): AttackInterceptors {
  const registry = new EventRegistry();
  for (const e of events) registry.register(e);
  return registry;
}

function village(rng: () => number = () => 0) {
  const view = seatTable(
    [
      ['Mal', 'assassin'],
      ['Doc', 'doctor'],
      ['Town', 'villager'],
      ['Guard', 'villager'],
      ['Zed', 'villager'],
    ],
    1,
    rng
  );
  view.apply([deathEffect('Zed', 'lynch', 'test', 1), modifierEffect('Zed', 'zombie', 'test')]);
  return view;
}

// --- Tests ---

test('resolveAttack: an unprotected target is killed by the attack effects', () => {
  const view = village();
  const out = resolveAttack(view, assassinate('Town'), interceptors());
  assert.equal(out.result, 'killed');
  assert.deepEqual(out.effects, [nightKill('Town')]);
});

test('resolveAttack: the Doctor saves from assassins and the village hears about it', () => {
  const view = village();
  view.apply([modifierEffect('Town', 'protected', 'role:doctor')]);
  const out = resolveAttack(view, assassinate('Town'), interceptors());
  assert.equal(out.result, 'saved');
  assert.equal(out.effects[0]?.type, 'reveal');
});

test('resolveAttack: the Doctor cannot stop a zombie', () => {
  const view = village();
  view.apply([modifierEffect('Town', 'protected', 'role:doctor')]);
  const out = resolveAttack(view, zombieBite('Town'), interceptors());
  assert.equal(out.result, 'killed');
  assert.equal(out.effects[0]?.type, 'zombie_kill');
});

test('resolveAttack: counter-attack comes before the Doctor', () => {
  const view = village();
  view.apply([modifierEffect('Town', 'protected', 'role:doctor'), modifierEffect('Town', 'gun_nut', 'test')]);
  const out = resolveAttack(view, assassinate('Town'), interceptors(new GunNutEvent()));
  assert.equal(out.result, 'countered');
  assert.equal(out.effects[0]?.type, 'counter_kill');
  assert.equal(out.effects[0]?.target, 'Mal');
});

test('resolveAttack: the Doctor comes before the Bodyguard', () => {
  const view = village();
  view.apply([
    modifierEffect('Guard', 'bodyguard', 'test'),
    modifierEffect('Town', 'guarded', 'test', { data: { by: 'Guard' } }),
    modifierEffect('Town', 'protected', 'role:doctor'),
  ]);
  const out = resolveAttack(view, assassinate('Town'), interceptors(new BodyguardEvent()));
  assert.equal(out.result, 'saved');
  assert.equal(view.player('Guard')?.hasModifier('bodyguard'), true);
});

test('resolveAttack: the Bodyguard takes an unsaved hit', () => {
  const view = village();
  view.apply([
    modifierEffect('Guard', 'bodyguard', 'test'),
    modifierEffect('Town', 'guarded', 'test', { data: { by: 'Guard' } }),
  ]);
  const out = resolveAttack(view, assassinate('Town'), interceptors(new BodyguardEvent()));
  assert.equal(out.result, 'shielded');
  assert.equal(out.effects.at(-1)?.type, 'bodyguard_sacrifice');
});

test('resolveAttack: a target who died earlier in the night is skipped', () => {
  const view = village();
  view.apply([deathEffect('Town', 'vigilante', 'test', 1)]);
  const out = resolveAttack(view, assassinate('Town'), interceptors());
  assert.equal(out.result, 'no_target');
  assert.deepEqual(out.effects, []);
});

test('investigate: only the Assassins team reads as Assassin', () => {
  assert.equal(
    describeInvestigation(investigate('Det', 'Mal', 'assassins')),
    'You investigated Mal. They ARE an Assassin.'
  );
  assert.equal(
    describeInvestigation(investigate('Det', 'Zed', 'village')),
    'You investigated Zed. They are NOT an Assassin.'
  );
});

test('pluralityTarget: most votes win, ties go to the earliest choice', () => {
  assert.equal(pluralityTarget(['A', 'B', 'B']), 'B');
  assert.equal(pluralityTarget(['B', 'A', 'A', 'B']), 'B');
  assert.equal(pluralityTarget(['C']), 'C');
  assert.equal(pluralityTarget([]), undefined);
});

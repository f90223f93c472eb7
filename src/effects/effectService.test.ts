import test from 'node:test';
import assert from 'node:assert/strict';
import { EffectService } from './effectService.js';
import { deathEffect, isStateEffect, modifierEffect, removeModifierEffect, roleChangeEffect, type StateEffect } from './types.js';
import { PlayerState } from '../players/playerState.js';
import { GameInvariantError, UnknownEffectError } from '../errors.js';

function table() {
  return new Map([
    ['Alice', new PlayerState({ name: 'Alice', role: 'villager' })],
    ['Bob', new PlayerState({ name: 'Bob', role: 'assassin' })],
  ]);
}

const service = new EffectService();

test('apply is copy-on-write', () => {
  const before = table();
  const after = service.apply(before, modifierEffect('Alice', 'drunk', 'event:drunk', { expiresOn: 3 }));
  assert.equal(before.get('Alice')?.hasModifier('drunk'), false);
  assert.equal(after.get('Alice')?.hasModifier('drunk'), true);
  assert.equal(after.get('Alice')?.getModifier('drunk')?.expiresOn, 3);
  assert.equal(after.get('Alice')?.getModifier('drunk')?.appliedOn, 1);
});

test('kill_player marks the player dead with a cause-carrying modifier', () => {
  const after = service.apply(table(), deathEffect('Alice', 'heartbreak', 'event:lovers', 2));
  const alice = after.get('Alice');
  assert.equal(alice?.alive, false);
  assert.equal(alice?.getModifier('dead')?.str('cause'), 'heartbreak');
  assert.equal(alice?.getModifier('dead')?.num('day'), 2);
});

test('kill_player twice does not double-kill', () => {
  const once = service.apply(table(), deathEffect('Alice', 'first', 'test', 1));
  const twice = service.apply(once, deathEffect('Alice', 'second', 'test', 2));
  assert.equal(twice.get('Alice')?.getModifier('dead')?.str('cause'), 'first');
  assert.equal(twice.get('Alice')?.history.length, 0);
});

test('revive_player clears the dead modifier', () => {
  const dead = service.apply(table(), deathEffect('Alice', 'lynched', 'test', 1));
  const revived = service.apply(dead, { type: 'revive_player', target: 'Alice', source: 'event:priest' });
  assert.equal(revived.get('Alice')?.alive, true);
  assert.equal(revived.get('Alice')?.hasModifier('dead'), false);
});

test('applyAll runs effects in order', () => {
  const effects: StateEffect[] = [
    modifierEffect('Bob', 'lover', 'event:lovers', { data: { partner: 'Alice' } }),
    removeModifierEffect('Bob', 'lover', 'event:lovers'),
    roleChangeEffect('Alice', 'zombie', 'test'),
    { type: 'change_team', target: 'Alice', source: 'test', team: 'assassins' },
  ];
  const after = service.applyAll(table(), effects);
  assert.equal(after.get('Bob')?.hasModifier('lover'), false);
  assert.equal(after.get('Alice')?.role, 'zombie');
  assert.equal(after.get('Alice')?.team, 'assassins');
});

test('an effect on a nonexistent player throws', () => {
  assert.throws(() => service.apply(table(), deathEffect('Nobody', 'x', 'test', 1)), GameInvariantError);
});

test('an unknown effect type throws', () => {
  const bogus: StateEffect = JSON.parse('{"type":"teleport","target":"Alice","source":"test"}');
  assert.throws(() => service.apply(table(), bogus), UnknownEffectError);
});

test('isStateEffect separates table effects from game effects', () => {
  assert.equal(isStateEffect(deathEffect('Alice', 'x', 'test', 1)), true);
  assert.equal(isStateEffect({ type: 'suicide_death', target: 'Alice', source: 'event:suicidal' }), false);
});

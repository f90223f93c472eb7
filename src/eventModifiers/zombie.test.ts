import test from 'node:test';
import assert from 'node:assert/strict';
import { ZombieEvent, activeZombies } from './zombie.js';
import { deathEffect, modifierEffect } from '../effects/types.js';
import { seatTable } from '../testing/fakes.js';
import type { Elimination } from './base.js';

function setup() {
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

function death(player: string, day = 1): Elimination {
  return { player, cause: 'assassination', day, phase: 'night' };
}

test('setup infects every zombie-role player', () => {
  const view = seatTable([['Alice', 'assassin'], ['Bob', 'zombie'], ['Carol', 'villager']], 1, () => 0);
  const effects = new ZombieEvent().setup({ view, unclaimed: () => view.alivePlayers() });
  assert.deepEqual(
    effects.map(e => [e.type, e.target]),
    [['add_modifier', 'Bob']]
  );
});

test('without a zombie role one eligible player is secretly infected', () => {
  const view = setup();
  view.apply(new ZombieEvent().setup({ view, unclaimed: () => view.alivePlayers().filter(p => p.team === 'village') }));
  assert.equal(view.player('Bob')?.hasModifier('infected'), true);
  assert.equal(view.player('Bob')?.displayRole, 'Villager (Infected)');
});

test('only infected deaths schedule a rise', () => {
  const view = setup();
  const zombie = new ZombieEvent();
  view.apply([deathEffect('Carol', 'assassination', 'test', 1)]);
  assert.deepEqual(zombie.onPlayerEliminated(view, death('Carol')), []);
});

test('infected death, rise at the next night-start, then hunt', () => {
  const view = setup();
  const zombie = new ZombieEvent();
  view.apply([modifierEffect('Bob', 'infected', 'test'), deathEffect('Bob', 'assassination', 'test', 1)]);

  const narration = view.apply(zombie.onPlayerEliminated(view, death('Bob')));
  assert.equal(narration[0]?.type, 'narrate');
  assert.equal(view.player('Bob')?.hasModifier('pending_rise'), true);
  assert.deepEqual(activeZombies(view), []);

  view.advanceTo(2);
  view.apply(zombie.onNightStart(view));
  assert.equal(view.player('Bob')?.hasModifier('pending_rise'), false);
  assert.equal(view.player('Bob')?.getModifier('zombie')?.num('rose'), 2);
  assert.equal(view.player('Bob')?.displayRole, 'Zombie');
  assert.deepEqual(zombie.nightAttackers(view), ['Bob']);

  const attack = zombie.planNightAttack(view, 'Bob');
  assert.equal(attack?.target, 'Alice');
  assert.equal(attack?.protectable, false);
  assert.deepEqual(attack?.onHit, [{ type: 'zombie_kill', target: 'Alice', source: 'event:zombie', zombie: 'Bob' }]);
});

test('a pending rise converts exactly once', () => {
  const view = setup();
  const zombie = new ZombieEvent();
  view.apply([modifierEffect('Bob', 'infected', 'test'), deathEffect('Bob', 'assassination', 'test', 1)]);
  view.apply(zombie.onPlayerEliminated(view, death('Bob')));

  view.advanceTo(2);
  assert.equal(zombie.onNightStart(view).length, 3);
  view.apply(zombie.onNightStart(view));
  assert.deepEqual(zombie.onNightStart(view), []);
  assert.deepEqual(zombie.onPlayerEliminated(view, death('Bob', 2)), []);
});

test('a zombie with nobody left to bite plans nothing', () => {
  const view = seatTable([['Bob', 'villager']], 2, () => 0);
  view.apply([
    modifierEffect('Bob', 'zombie', 'test'),
    deathEffect('Bob', 'assassination', 'test', 1),
  ]);
  assert.equal(new ZombieEvent().planNightAttack(view, 'Bob'), undefined);
});

import test from 'node:test';
import assert from 'node:assert/strict';
import { GhostEvent, GHOST_CHANCE, becomesGhost, hauntersOf } from './ghost.js';
import { deathEffect, modifierEffect } from '../effects/types.js';
import { FakeNarrator, seatTable } from '../testing/fakes.js';
import { mulberry32 } from '../utils.js';

test('roughly one death in ten leaves a ghost', () => {
  const rng = mulberry32(42);
  let ghosts = 0;
  for (let i = 0; i < 1000; i++) if (becomesGhost(rng)) ghosts++;
  assert.equal(GHOST_CHANCE, 0.1);
  assert.ok(ghosts >= 50 && ghosts <= 150, `got ${ghosts} ghosts`);
});

test('a death under the ghost roll asks the engine for a ghost', () => {
  const event = new GhostEvent();
  const elimination = { player: 'Alice', cause: 'lynch', day: 1, phase: 'day' } as const;

  const lucky = seatTable([['Alice', 'villager']], 1, () => 0.05);
  assert.deepEqual(event.onPlayerEliminated(lucky, elimination), [
    { type: 'become_ghost', target: 'Alice', source: 'event:ghost' },
  ]);

  const unlucky = seatTable([['Alice', 'villager']], 1, () => 0.5);
  assert.deepEqual(event.onPlayerEliminated(unlucky, elimination), []);
});

test('a pending ghost picks a living player to haunt', async () => {
  const view = seatTable([['Alice', 'villager'], ['Bob', 'assassin'], ['Carol', 'doctor']]);
  view.apply([
    deathEffect('Alice', 'lynch', 'test', 1),
    modifierEffect('Alice', 'ghost', 'test', { data: { haunting: null } }),
    modifierEffect('Alice', 'ghost_pending', 'test'),
  ]);
  const narrator = new FakeNarrator(() => 'Carol');

  const rest = view.apply(await new GhostEvent().resolvePendingChoices({ view, narrator, contextFor: () => '' }));

  assert.deepEqual(narrator.choicesOf('ghost_haunt')[0]?.req.options, ['Bob', 'Carol']);
  assert.equal(view.player('Alice')?.hasModifier('ghost_pending'), false);
  assert.deepEqual(hauntersOf(view, 'Carol'), ['Alice']);
  assert.deepEqual(hauntersOf(view, 'Bob'), []);
  assert.equal(rest[0]?.type, 'reveal');
});

test('nothing is pending, nobody is asked', async () => {
  const view = seatTable([['Alice', 'villager'], ['Bob', 'assassin']]);
  const narrator = new FakeNarrator();
  assert.deepEqual(await new GhostEvent().resolvePendingChoices({ view, narrator, contextFor: () => '' }), []);
  assert.equal(narrator.choices.length, 0);
});

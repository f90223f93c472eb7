import test from 'node:test';
import assert from 'node:assert/strict';
import { roleBriefing, situationContext, statusLines } from './context.js';
import { modifierEffect } from './effects/types.js';
import { seatTable } from './testing/fakes.js';

test('roleBriefing: role, team and description', () => {
  const briefing = roleBriefing({ role: 'doctor', team: 'village' });
  assert.ok(briefing.startsWith('Your Role: Doctor (team: village)\nYou are the Doctor.'));
});

test('statusLines: infection stays hidden, love does not', () => {
  const view = seatTable([['Ann', 'villager'], ['Ben', 'vigilante']]);
  view.apply([
    modifierEffect('Ann', 'infected', 'test'),
    modifierEffect('Ann', 'lover', 'test', { data: { partner: 'Ben' } }),
  ]);
  assert.deepEqual(statusLines(view.player('Ann') ?? assert.fail('missing Ann')), [
    'You are in love with Ben. If they die, you will die of a broken heart.',
  ]);
  assert.deepEqual(statusLines(view.player('Ben') ?? assert.fail('missing Ben')), ['You still have your one shot.']);
});

test('situationContext: lists the living and what the player knows', () => {
  const view = seatTable([['Ann', 'villager'], ['Ben', 'assassin']]);
  const text = situationContext({
    player: view.player('Ann') ?? assert.fail('missing Ann'),
    day: 2,
    phase: 'day',
    alive: ['Ann', 'Ben'],
    dead: ['Cat'],
    knowledge: 'Cat died.',
  });
  assert.equal(
    text,
    'You are Ann. It is Day 2.\n\nAlive players: Ann, Ben.\n\nDead players: Cat.\n\nWhat you know:\nCat died.'
  );
});

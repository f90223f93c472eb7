import test from 'node:test';
import assert from 'node:assert/strict';
import { DayDiscussionPhase, isBlankPost } from './dayDiscussionPhase.js';
import { DayVotingPhase } from './dayVotingPhase.js';
import { NightPhase } from './nightPhase.js';
import { modifierEffect } from '../effects/types.js';
import { seatEngine } from '../testing/engine.js';
import { FakeNarrator } from '../testing/fakes.js';
import { ABSTAIN } from '../voting/votes.js';
import type { Role } from '../types.js';

const TABLE: Array<[string, Role]> = [
  ['Ann', 'assassin'],
  ['Ben', 'assassin'],
  ['Cat', 'doctor'],
  ['Dan', 'detective'],
  ['Eve', 'villager'],
  ['Vic', 'vigilante'],
];

test('isBlankPost: skip words and silence post nothing', () => {
  assert.equal(isBlankPost('  SKIP '), true);
  assert.equal(isBlankPost('none'), true);
  assert.equal(isBlankPost(''), true);
  assert.equal(isBlankPost('Dan remains silent.'), true);
  assert.equal(isBlankPost('Watch Ann.'), false);
});

test('night: the assassins and the vigilante both land their attacks', async () => {
  const narrator = new FakeNarrator((_p, req) => {
    if (req.kind === 'assassin_target') return 'Eve';
    if (req.kind === 'vigilante_shoot') return 'Ann';
    return req.options[0] ?? '';
  });
  const engine = seatEngine(
    [['Ann', 'assassin'], ['Dan', 'detective'], ['Eve', 'villager'], ['Fay', 'villager'], ['Vic', 'vigilante']],
    { narrator }
  );

  await new NightPhase().run(engine);

  assert.deepEqual(
    engine.eliminations.map(e => [e.player, e.cause]),
    [
      ['Eve', 'assassination'],
      ['Ann', 'vigilante'],
    ]
  );
  assert.deepEqual(engine.pendingDeathReport, ['Eve', 'Ann']);
  assert.equal(engine.checkWinCondition(), 'village');
});

test('day discussion: dawn report, truth serum, then one statement per living player', async () => {
  const narrator = new FakeNarrator();
  const engine = seatEngine(TABLE, { narrator });
  engine.eliminatePlayer('Eve', { cause: 'assassination', privateReason: 'test', publicReason: 'Eve was found dead.' });
  engine.applyEffects([modifierEffect('Ann', 'truth_serum', 'role:mad_scientist', { data: { by: 'Sci' } })]);
  engine.advancePhase();

  await new DayDiscussionPhase().run(engine);

  const lines = engine.history.map(e => e.content);
  assert.ok(lines.includes('The village wakes up to grim news: Eve is dead.'));
  assert.ok(lines.includes('Ann was injected with a truth serum and blurts out that they are an Assassin!'));
  assert.equal(engine.player('Ann')?.hasModifier('truth_serum'), false);
  assert.ok(engine.info.buildContextFor('Cat').includes('Ann is an Assassin.'));

  const chat = engine.history.filter(e => e.type === 'CHAT');
  assert.equal(chat.length, 5);
  assert.ok(chat.every(e => e.metadata?.kind === 'discussion'));
  assert.ok(!chat.some(e => e.player === 'Eve'));
});

test('day discussion: each earlier statement reaches later speakers exactly once', async () => {
  const spoken = new Map<string, number>();
  const narrator = new FakeNarrator(undefined, player => {
    const n = (spoken.get(player) ?? 0) + 1;
    spoken.set(player, n);
    return `UNIQUE-${player}-${n}`;
  });
  const seats: Array<[string, Role]> = [
    ['Ann', 'assassin'],
    ['Cat', 'doctor'],
    ['Dan', 'detective'],
    ['Eve', 'villager'],
    ['Fay', 'villager'],
  ];
  const engine = seatEngine(seats, { narrator, config: { discussion_rounds: 2 } });
  engine.advancePhase();

  await new DayDiscussionPhase().run(engine);

  const contexts = narrator.statements.map(s => s.req.context);
  assert.equal(contexts.length, 10);
  const count = (text: string, line: string) => text.split(line).length - 1;
  const endOfFirstRound = contexts[4] ?? '';
  for (const name of ['Ann', 'Cat', 'Dan', 'Eve']) {
    assert.equal(count(endOfFirstRound, `${name} said: UNIQUE-${name}-1`), 1, name);
  }
  const endOfSecondRound = contexts[9] ?? '';
  for (const name of ['Ann', 'Cat', 'Dan', 'Eve', 'Fay']) {
    assert.equal(count(endOfSecondRound, `${name} said: UNIQUE-${name}-1`), 1, name);
  }
  for (const name of ['Ann', 'Cat', 'Dan', 'Eve']) {
    assert.equal(count(endOfSecondRound, `${name} said: UNIQUE-${name}-2`), 1, name);
  }
});

test('day discussion: a ghost answers right after the player it haunts, in public', async () => {
  const narrator = new FakeNarrator();
  const engine = seatEngine(TABLE, { narrator });
  engine.eliminatePlayer('Eve', { cause: 'assassination', privateReason: 'test', publicReason: 'Eve was found dead.' });
  engine.applyEffects([modifierEffect('Eve', 'ghost', 'event:ghost', { data: { haunting: 'Cat' } })]);
  engine.advancePhase();

  await new DayDiscussionPhase().run(engine);

  assert.deepEqual(
    narrator.statements.map(s => `${s.player}:${s.req.kind}`),
    ['Ann:discussion', 'Ben:discussion', 'Cat:discussion', 'Eve:ghost_aside', 'Dan:discussion', 'Vic:discussion']
  );
  for (const name of ['Ann', 'Ben', 'Cat', 'Dan', 'Eve', 'Vic']) {
    assert.ok(engine.info.buildContextFor(name).includes('Eve (ghost) said: Eve (ghost_aside)'), name);
  }
  assert.deepEqual(
    engine.history.filter(e => e.metadata?.kind === 'ghost').map(e => [e.player, e.content]),
    [['Eve (ghost)', 'Eve (ghost_aside)']]
  );
});

test('day discussion: blackboard notes are anonymous and blanks are dropped', async () => {
  const narrator = new FakeNarrator(undefined, (player, req) =>
    req.kind === 'blackboard' ? (player === 'Cat' ? 'Watch Ann.' : 'SKIP') : `${player} speaks`
  );
  const engine = seatEngine(TABLE, { narrator, config: { blackboard: true } });
  engine.advancePhase();

  await new DayDiscussionPhase().run(engine);

  const notes = engine.history.filter(e => e.metadata?.kind === 'blackboard');
  assert.deepEqual(notes.map(e => [e.content, e.player]), [['[Blackboard] Watch Ann.', undefined]]);
  assert.ok(engine.info.buildContextFor('Dan').includes('Anonymous note on the blackboard: "Watch Ann."'));
});

test('day voting: a tie lynches nobody', async () => {
  const ballots: Record<string, string> = { Ann: 'Eve', Ben: 'Eve', Cat: 'Ann', Dan: 'Ann', Eve: ABSTAIN, Vic: ABSTAIN };
  const narrator = new FakeNarrator((player, req) => ballots[player] ?? req.options[0] ?? '');
  const engine = seatEngine(TABLE, { narrator });
  engine.advancePhase();

  await new DayVotingPhase().run(engine);

  assert.equal(engine.eliminations.length, 0);
  assert.equal(engine.history.at(-1)?.content, 'The vote is tied between Eve and Ann. Nobody is lynched today.');
  assert.deepEqual(
    engine.history.filter(e => e.type === 'VOTE').map(e => `${e.player} ${e.content}`),
    ['Ann voted for Eve', 'Ben voted for Eve', 'Cat voted for Ann', 'Dan voted for Ann', 'Eve abstained', 'Vic abstained']
  );
});

test('day voting: a single leader is lynched', async () => {
  const narrator = new FakeNarrator((player, req) => (player === 'Ann' ? 'Cat' : req.options.includes('Ann') ? 'Ann' : 'Ben'));
  const engine = seatEngine(TABLE, { narrator });
  engine.advancePhase();

  await new DayVotingPhase().run(engine);

  assert.deepEqual(engine.eliminations.map(e => [e.player, e.cause, e.reason]), [['Ann', 'lynch', 'Lynched by the town with 5 votes.']]);
  assert.ok(engine.history.some(e => e.content === 'Ann was lynched by the town. They were an Assassin.'));
});

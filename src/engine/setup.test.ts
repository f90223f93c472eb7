import test from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import { defaultRoleList } from '../roles.js';
import { testConfig } from '../testing/engine.js';
import { FakeNarrator } from '../testing/fakes.js';
import { mulberry32 } from '../utils.js';
import { assignRoles, buildPlayers, createGame, roleCounts, seatedRoster } from './setup.js';

logger.setConsoleOutputEnabled(false);

const NAMES = ['Ann', 'Ben', 'Cat', 'Dan', 'Eve', 'Fay'];

test('seatedRoster: player_count seats the first N', () => {
  assert.deepEqual(
    seatedRoster(testConfig(NAMES, { player_count: 5 })).map(p => p.name),
    ['Ann', 'Ben', 'Cat', 'Dan', 'Eve']
  );
});

test('assignRoles: the default list is shuffled over the seats', () => {
  const seats = assignRoles(testConfig(NAMES), mulberry32(5));
  assert.deepEqual(seats.map(s => s.name), NAMES);
  assert.deepEqual(seats.map(s => s.role).sort(), [...defaultRoleList(6)].sort());
});

test('assignRoles: forced roles must cover every seat and nobody else', () => {
  const roles = { Ann: 'assassin', Ben: 'doctor', Cat: 'villager', Dan: 'villager', Eve: 'villager' } as const;

  const seats = assignRoles(testConfig(NAMES, { player_count: 5, roles }), mulberry32(1));
  assert.deepEqual(roleCounts(seats), { assassin: 1, doctor: 1, villager: 3 });

  assert.throws(() => assignRoles(testConfig(NAMES, { roles }), mulberry32(1)), ConfigError);
  assert.throws(
    () => assignRoles(testConfig(NAMES, { player_count: 5, roles: { ...roles, Zed: 'villager' } }), mulberry32(1)),
    ConfigError
  );
});

test('createGame: chaos registers every event and runs their setup', () => {
  const engine = createGame(testConfig(NAMES, { chaos: true, seed: 11 }), { narrator: new FakeNarrator() });

  assert.equal(engine.registry.kinds.length, 11);
  assert.deepEqual(engine.info.registeredPlayers, NAMES);
  const lovers = engine.players().filter(p => p.hasModifier('lover'));
  assert.ok(lovers.length === 0 || lovers.length === 2);
});

test('createGame: no events unless asked for', () => {
  const engine = createGame(testConfig(NAMES, { seed: 11 }), { narrator: new FakeNarrator() });
  assert.deepEqual(engine.registry.kinds, []);
});

test('buildPlayers: one agent per seated player', () => {
  const config = testConfig(NAMES, { player_count: 5 });
  const { agents } = buildPlayers(config, assignRoles(config, mulberry32(2)));
  assert.deepEqual(Object.keys(agents), ['Ann', 'Ben', 'Cat', 'Dan', 'Eve']);
});

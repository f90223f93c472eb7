import { GameEngine, type Seat } from '../engine/gameEngine.js';
import { EventRegistry } from '../eventModifiers/registry.js';
import type { EventModifier } from '../eventModifiers/base.js';
import { logger } from '../logger.js';
import { GameConfigSchema, type GameConfig, type GameConfigInput, type Role } from '../types.js';
import type { Rng } from '../utils.js';
import { FakeNarrator } from './fakes.js';

/** A quiet config for the given names; no introductions, reflections or pauses. */
export function testConfig(names: readonly string[], overrides: Partial<GameConfigInput> = {}): GameConfig {
  return GameConfigSchema.parse({
    players: names.map(name => ({ name, personality: 'calm', model: 'test/model' })),
    introductions: false,
    post_game_reflections: false,
    discussion_rounds: 1,
    ...overrides,
  });
}

export interface TestEngineOptions {
  narrator?: FakeNarrator;
  events?: readonly EventModifier[];
  rng?: Rng;
  config?: Partial<GameConfigInput>;
}

/** An initialized engine over `seats`, console output silenced. */
export function seatEngine(seats: ReadonlyArray<[string, Role]>, opts: TestEngineOptions = {}): GameEngine {
  logger.setConsoleOutputEnabled(false);
  const names = seats.map(([name]) => name);
  const registry = new EventRegistry();
  for (const e of opts.events ?? []) registry.register(e);
  const table: Seat[] = seats.map(([name, role]) => ({ name, role, personality: 'calm' }));
  const engine = new GameEngine(testConfig(names, opts.config), table, {
    narrator: opts.narrator ?? new FakeNarrator(),
    registry,
    rng: opts.rng ?? (() => 0.5),
  });
  engine.initialize();
  return engine;
}

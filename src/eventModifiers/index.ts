import type { EventKind, GameConfig } from '../types.js';
import type { Rng } from '../utils.js';
import type { EventModifier, EventOptions } from './base.js';
import { BodyguardEvent } from './bodyguard.js';
import { DrunkEvent } from './drunk.js';
import { GhostEvent } from './ghost.js';
import { GunNutEvent } from './gunNut.js';
import { InsomniacEvent } from './insomniac.js';
import { JesterEvent } from './jester.js';
import { LoversEvent } from './lovers.js';
import { PriestEvent } from './priest.js';
import { EVENT_SETUP_ORDER, EventRegistry } from './registry.js';
import { SleepwalkerEvent } from './sleepwalker.js';
import { SuicidalEvent } from './suicidal.js';
import { ZombieEvent } from './zombie.js';

export const EVENT_FACTORIES: Record<EventKind, (opts: EventOptions) => EventModifier> = {
  zombie: opts => new ZombieEvent(opts),
  ghost: opts => new GhostEvent(opts),
  sleepwalker: opts => new SleepwalkerEvent(opts),
  insomniac: opts => new InsomniacEvent(opts),
  gun_nut: opts => new GunNutEvent(opts),
  suicidal: opts => new SuicidalEvent(opts),
  drunk: opts => new DrunkEvent(opts),
  jester: opts => new JesterEvent(opts),
  priest: opts => new PriestEvent(opts),
  lovers: opts => new LoversEvent(opts),
  bodyguard: opts => new BodyguardEvent(opts),
};

export type EventSettings = Pick<GameConfig, 'events' | 'chaos' | 'random_events' | 'event_probability'>;

/**
 * Chaos enables everything. Explicitly enabled events always activate.
 * In random mode every other event rolls its own activation probability.
 */
export function buildEventRegistry(settings: EventSettings, rng: Rng): EventRegistry {
  const registry = new EventRegistry();
  for (const kind of EVENT_SETUP_ORDER) {
    const event = EVENT_FACTORIES[kind]({ probability: settings.event_probability });
    const forced = settings.chaos || settings.events[kind];
    if (forced || (settings.random_events && event.shouldActivate(rng))) registry.register(event);
  }
  return registry;
}

export { EventRegistry, EVENT_SETUP_ORDER } from './registry.js';
export type * from './base.js';

import type { GameEngine } from '../engine/gameEngine.js';
import { modifierEffect, privateReveal, type Effect } from '../effects/types.js';
import { logger } from '../logger.js';
import type { EventKind } from '../types.js';
import { pickOne, type Rng } from '../utils.js';

export const TRUTH_SERUM_CHANCE = 0.15;
const SOURCE = 'role:mad_scientist';

export interface Experiment {
  name: string;
  /** Only offered while this event is running, so the status has something to do. */
  requires: EventKind;
  effects(target: string, engine: GameEngine): Effect[];
}

const EXPERIMENTS: readonly Experiment[] = [
  {
    name: 'an experimental infection',
    requires: 'zombie',
    effects: target => [modifierEffect(target, 'infected', SOURCE)],
  },
  {
    name: 'a love potion',
    requires: 'lovers',
    effects: (target, engine) => {
      const partner = pickOne(
        engine.aliveNames().filter(n => n !== target),
        engine.rng
      );
      if (!partner) return [];
      return [
        modifierEffect(target, 'lover', SOURCE, { data: { partner } }),
        privateReveal(target, `You wake up hopelessly in love with ${partner}. If they die, so will you.`, SOURCE),
      ];
    },
  },
  {
    name: 'a strong sedative',
    requires: 'sleepwalker',
    effects: target => [modifierEffect(target, 'sleepwalker', SOURCE)],
  },
  {
    name: 'a stimulant',
    requires: 'insomniac',
    effects: target => [modifierEffect(target, 'insomniac', SOURCE)],
  },
  {
    name: 'a grain spirit tonic',
    requires: 'drunk',
    effects: (target, engine) => [modifierEffect(target, 'drunk', SOURCE, { expiresOn: engine.day })],
  },
  {
    name: 'a mood depressant',
    requires: 'suicidal',
    effects: target => [modifierEffect(target, 'suicidal', SOURCE)],
  },
];

export type ExperimentOutcome = { kind: 'truth_serum' } | { kind: 'side_effect'; experiment: Experiment };

/** Truth serum 15% of the time, or always when no active event gives a side effect meaning. */
export function rollExperiment(active: readonly EventKind[], rng: Rng): ExperimentOutcome {
  const available = EXPERIMENTS.filter(e => active.includes(e.requires));
  if (available.length === 0 || rng() < TRUTH_SERUM_CHANCE) return { kind: 'truth_serum' };
  const experiment = pickOne(available, rng);
  return experiment ? { kind: 'side_effect', experiment } : { kind: 'truth_serum' };
}

export async function collectExperiments(engine: GameEngine): Promise<Effect[]> {
  const effects: Effect[] = [];
  const day = engine.day;

  for (const sci of engine.alivePlayers().filter(p => p.role === 'mad_scientist')) {
    const options = engine.aliveNames().filter(n => n !== sci.name);
    if (options.length === 0) continue;

    const { choice: target, reasoning } = await engine.narrator.chooseWithReasoning(sci.name, {
      kind: 'mad_scientist_experiment',
      prompt: `Night ${day}. You are the Mad Scientist. Choose ONE player to experiment on tonight.`,
      options,
      context: engine.contextFor(sci.name),
    });
    engine.logThought(sci.name, reasoning);

    const outcome = rollExperiment(engine.registry.kinds, engine.rng);
    if (outcome.kind === 'truth_serum') {
      effects.push(
        // Read at the next day-start, then removed.
        modifierEffect(target, 'truth_serum', SOURCE, { data: { by: sci.name }, appliedOn: day }),
        privateReveal(sci.name, `You injected ${target} with a truth serum. Their role will be exposed at dawn.`, SOURCE)
      );
    } else {
      effects.push(
        ...outcome.experiment.effects(target, engine),
        privateReveal(sci.name, `You tested ${outcome.experiment.name} on ${target}.`, SOURCE)
      );
    }
    logger.log({
      type: 'ACTION',
      player: sci.name,
      content: `experimented on ${target}: ${outcome.kind === 'truth_serum' ? 'truth serum' : outcome.experiment.name}`,
      metadata: { target, result: outcome.kind, role: 'mad_scientist', visibility: 'private' },
    });
  }

  return effects;
}

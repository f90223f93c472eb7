import type { GameEngine } from '../engine/gameEngine.js';
import { modifierEffect, privateReveal, type Effect } from '../effects/types.js';
import { logger } from '../logger.js';

export const VIGILANTE_SKIP = "Skip (don't kill anyone tonight)";
const SOURCE = 'role:vigilante';

export interface VigilanteShot {
  shooter: string;
  target: string;
  effects: Effect[];
}

/** One bullet per game; holding fire keeps it. */
export async function collectVigilanteShots(engine: GameEngine): Promise<VigilanteShot[]> {
  const shots: VigilanteShot[] = [];
  const day = engine.day;

  for (const vigi of engine.alivePlayers().filter(p => p.role === 'vigilante')) {
    if (vigi.hasModifier('vigilante_used')) continue;
    const targets = engine.aliveNames().filter(n => n !== vigi.name);
    if (targets.length === 0) continue;

    const { choice, reasoning } = await engine.narrator.chooseWithReasoning(vigi.name, {
      kind: 'vigilante_shoot',
      prompt: `Night ${day}. You are the Vigilante. You may shoot ONE player tonight, once per game, or skip and keep your bullet.`,
      options: [VIGILANTE_SKIP, ...targets],
      context: engine.contextFor(vigi.name),
    });
    engine.logThought(vigi.name, reasoning);
    if (choice === VIGILANTE_SKIP) continue;

    shots.push({
      shooter: vigi.name,
      target: choice,
      effects: [
        modifierEffect(vigi.name, 'vigilante_used', SOURCE, { data: { target: choice }, appliedOn: day }),
        privateReveal(vigi.name, `You used your one shot on ${choice} on Night ${day}.`, SOURCE, 'action'),
      ],
    });
    logger.log({
      type: 'ACTION',
      player: vigi.name,
      content: `chose to shoot ${choice}`,
      metadata: { target: choice, role: 'vigilante', visibility: 'private' },
    });
  }

  return shots;
}

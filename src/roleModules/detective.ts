import type { GameEngine } from '../engine/gameEngine.js';
import { describeInvestigation, investigate } from '../actions/resolver.js';
import { privateReveal, type Effect } from '../effects/types.js';
import { logger } from '../logger.js';

export async function collectInvestigations(engine: GameEngine): Promise<Effect[]> {
  const effects: Effect[] = [];
  const day = engine.day;

  for (const det of engine.alivePlayers().filter(p => p.role === 'detective')) {
    const options = engine.aliveNames().filter(n => n !== det.name);
    if (options.length === 0) continue;

    const { choice: target, reasoning } = await engine.narrator.chooseWithReasoning(det.name, {
      kind: 'detective_investigate',
      prompt: `Night ${day}. You are the Detective. Choose ONE player to investigate.`,
      options,
      context: engine.contextFor(det.name),
    });
    engine.logThought(det.name, reasoning);

    const suspect = engine.player(target);
    if (!suspect) continue;
    const result = investigate(det.name, target, suspect.team);
    effects.push(privateReveal(det.name, `Night ${day}: ${describeInvestigation(result)}`, 'role:detective'));
    logger.log({
      type: 'ACTION',
      player: det.name,
      content: `investigated ${target} and found ${result.result}`,
      metadata: { target, result: result.result, role: 'detective', visibility: 'private' },
    });
  }

  return effects;
}

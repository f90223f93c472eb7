import type { GameEngine } from '../engine/gameEngine.js';
import { modifierEffect, privateReveal, type Effect } from '../effects/types.js';
import { logger } from '../logger.js';

const SOURCE = 'role:doctor';

/** The same player can't be protected two nights running. */
export async function collectDoctorProtection(engine: GameEngine): Promise<Effect[]> {
  const effects: Effect[] = [];
  const day = engine.day;

  for (const doc of engine.alivePlayers().filter(p => p.role === 'doctor')) {
    const last = doc.getModifier('last_protected')?.str('target');
    const options = engine.aliveNames().filter(n => n !== last);
    if (options.length === 0) continue;

    const { choice: target, reasoning } = await engine.narrator.chooseWithReasoning(doc.name, {
      kind: 'doctor_protect',
      prompt:
        `Night ${day}. You are the Doctor. Choose ONE player to protect tonight.` +
        (last ? ` You protected ${last} last night and cannot protect them again.` : ''),
      options,
      context: engine.contextFor(doc.name),
    });
    engine.logThought(doc.name, reasoning);

    effects.push(
      modifierEffect(target, 'protected', SOURCE, { data: { by: doc.name }, appliedOn: day, expiresOn: day }),
      modifierEffect(doc.name, 'last_protected', SOURCE, { data: { target }, appliedOn: day }),
      privateReveal(doc.name, `You chose to protect ${target} on Night ${day}.`, SOURCE, 'action')
    );
    logger.log({
      type: 'ACTION',
      player: doc.name,
      content: `chose to protect ${target}`,
      metadata: { target, role: 'doctor', visibility: 'private' },
    });
  }

  return effects;
}

import type { GameEngine } from '../engine/gameEngine.js';
import { pluralityTarget } from '../actions/resolver.js';
import { formatStatement } from '../conversation/conversation.js';
import { Visibility } from '../information/information.js';
import { logger } from '../logger.js';

/**
 * Team chat (when there is more than one of them) followed by one vote each.
 * Returns the agreed target, or undefined when nobody is left to attack.
 */
export async function collectAssassinTarget(engine: GameEngine): Promise<string | undefined> {
  const assassins = engine.alivePlayers().filter(p => p.team === 'assassins');
  const names = assassins.map(p => p.name);
  const targets = engine
    .alivePlayers()
    .filter(p => p.team !== 'assassins')
    .map(p => p.name);
  if (assassins.length === 0 || targets.length === 0) return undefined;

  const day = engine.day;
  if (assassins.length > 1) {
    await engine.conversation.conductRound({
      participants: assassins,
      day,
      round: 1,
      phase: 'team_discussion',
      kind: 'team_discussion',
      prompt: `Night ${day}. Talk privately with your fellow Assassins (${names.join(', ')}) about who to eliminate tonight. Targets: ${targets.join(', ')}.`,
      contextFor: name => engine.contextFor(name),
      visibility: Visibility.team('assassins'),
      onStatement: s => {
        engine.info.revealToTeam('assassins', names, formatStatement(s), { category: 'statement', day, source: s.speaker });
        logger.log({
          type: 'TEAM_CHAT',
          player: s.speaker,
          content: s.content,
          metadata: { team: 'assassins', visibility: 'team' },
        });
      },
    });
  }

  const picks: string[] = [];
  for (const name of names) {
    const { choice, reasoning } = await engine.narrator.chooseWithReasoning(name, {
      kind: 'assassin_target',
      prompt: `Night ${day}. Choose ONE player for the Assassins to eliminate tonight.`,
      options: targets,
      context: engine.contextFor(name),
    });
    picks.push(choice);
    engine.info.revealToTeam('assassins', names, `${name} wants to eliminate ${choice}.`, {
      category: 'action',
      day,
      source: name,
    });
    engine.logThought(name, reasoning);
  }

  const target = pluralityTarget(picks);
  if (target === undefined) return undefined;
  engine.info.revealToTeam('assassins', names, `The Assassins agreed to target ${target} tonight.`, {
    category: 'night_result',
    day,
    source: 'role:assassin',
  });
  logger.log({
    type: 'ACTION',
    content: `Assassins target ${target} (${picks.join(', ')})`,
    metadata: { target, role: 'assassin', team: 'assassins', visibility: 'team' },
  });
  return target;
}

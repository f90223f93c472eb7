import type { GameEngine } from '../engine/gameEngine.js';
import { buildTranscriptText } from '../logger.js';
import type { Winner } from '../types.js';

function didWin(winner: Winner | undefined, team: string, name: string, jester?: string): boolean {
  if (winner === 'jester') return name === jester;
  return winner === team;
}

export class PostGamePhase {
  async run(engine: GameEngine): Promise<void> {
    engine.recordPublic({ type: 'SYSTEM', content: '--- Final role reveal ---' });
    const roleSummary = engine.players().map(
      p => `${p.name} was ${p.roleDisplayWithArticle}${p.alive ? '' : ' (dead)'}`
    );
    for (const line of roleSummary) {
      engine.recordPublic({ type: 'SYSTEM', content: line, metadata: { kind: 'final_reveal' } });
    }

    if (!engine.config.post_game_reflections) return;
    engine.recordPublic({ type: 'SYSTEM', content: '--- Post-game reflections ---' });

    // Everyone, dead or alive, reflects on the same public transcript.
    const transcript = buildTranscriptText(engine.history);
    const outcome = engine.winAnnouncement();

    for (const player of engine.players()) {
      const won = didWin(engine.winner, player.team, player.name, engine.jesterWinner);
      const { statement } = await engine.narrator.statement(player.name, {
        kind: 'reflection',
        prompt: `${outcome}

Final role reveal:
${roleSummary.join('\n')}

Your role was ${player.roleDisplayWithArticle}. You ${player.alive ? 'survived' : 'died'} during the game. You ${won ? 'won' : 'lost'}.

Give a brief post-game reflection (2-3 sentences). You can now discuss your true role, what you were thinking during key moments, what surprised you, or what you'd do differently.`,
        context: `Game transcript:\n${transcript}`,
        maxLength: 600,
      });

      engine.recordPublic({
        type: 'CHAT',
        player: player.name,
        content: statement,
        metadata: { kind: 'post_game_reflection' },
      });
    }
  }
}

import type { GameEngine } from '../engine/gameEngine.js';
import { formatStatement } from '../conversation/conversation.js';
import { Visibility } from '../information/information.js';

/** Day 0: everyone says hello once, in seat order. */
export class IntroductionPhase {
  async run(engine: GameEngine): Promise<void> {
    engine.recordPublic({ type: 'SYSTEM', content: '--- Introductions ---' });
    await engine.conversation.conductRound({
      participants: engine.alivePlayers(),
      day: 0,
      round: 1,
      phase: 'introduction',
      kind: 'introduction',
      prompt: 'The game is about to begin. Introduce yourself to the village in one or two sentences. Do not reveal your role.',
      contextFor: name => engine.contextFor(name),
      visibility: Visibility.public(),
      maxLength: 300,
      fixedOrder: true,
      onStatement: s => {
        engine.info.revealToAll(formatStatement(s), { category: 'statement', day: 0, source: s.speaker });
        engine.recordPublic({ type: 'CHAT', player: s.speaker, content: s.content, metadata: { kind: 'introduction' } });
      },
    });
  }
}

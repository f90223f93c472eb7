import type { GameEngine } from '../engine/gameEngine.js';
import { createStatement, formatStatement, type Statement } from '../conversation/conversation.js';
import { removeModifierEffect } from '../effects/types.js';
import { hauntersOf } from '../eventModifiers/ghost.js';
import { Visibility } from '../information/information.js';
import { logger } from '../logger.js';
import { joinNames } from '../utils.js';

const STATEMENT_MAX = 500;
const ASIDE_MAX = 200;
const BLACKBOARD_MAX = 200;

/** Blackboard answers that mean "post nothing". */
export function isBlankPost(text: string): boolean {
  const t = text.trim().toLowerCase();
  return t === '' || t === 'skip' || t === 'none' || t.endsWith('remains silent.');
}

export class DayDiscussionPhase {
  async run(engine: GameEngine): Promise<void> {
    const day = engine.day;
    engine.recordPublic({ type: 'SYSTEM', content: `--- Day ${day} ---` });

    this.applyTruthSerum(engine);
    this.reportDeaths(engine);
    engine.applyEffects(await engine.registry.dayStart(engine.decisionContext()));
    if (engine.config.blackboard) await this.blackboard(engine);

    for (let round = 1; round <= engine.config.discussion_rounds; round++) {
      engine.recordPublic({ type: 'SYSTEM', content: `Discussion round ${round} of ${engine.config.discussion_rounds}` });
      await engine.conversation.conductRound({
        participants: engine.alivePlayers(),
        day,
        round,
        phase: 'discussion',
        kind: 'discussion',
        prompt:
          `Day ${day}, discussion round ${round}. Share your suspicions, defend yourself, or question others. ` +
          'Keep it to a few sentences.',
        contextFor: name => engine.contextFor(name),
        visibility: Visibility.public(),
        maxLength: STATEMENT_MAX,
        onStatement: s => this.publish(engine, s),
        afterTurn: s => this.ghostAsides(engine, s),
      });
    }
  }

  private reportDeaths(engine: GameEngine): void {
    const deaths = engine.pendingDeathReport;
    engine.pendingDeathReport = [];
    engine.announce(
      deaths.length === 0
        ? 'The village wakes up. Nobody died last night.'
        : `The village wakes up to grim news: ${joinNames(deaths)} ${deaths.length === 1 ? 'is' : 'are'} dead.`
    );
  }

  /** Serum injected last night comes out now, then wears off. */
  private applyTruthSerum(engine: GameEngine): void {
    for (const p of engine.alivePlayers().filter(p => p.hasModifier('truth_serum'))) {
      engine.recordPublic({
        type: 'SYSTEM',
        content: `${p.name} was injected with a truth serum and blurts out that they are ${p.roleDisplayWithArticle}!`,
      });
      engine.info.revealRole(p.name, p.roleDisplayWithArticle, engine.day, 'role:mad_scientist');
      engine.applyEffects([removeModifierEffect(p.name, 'truth_serum', 'role:mad_scientist')]);
    }
  }

  /** Anonymous notes: everyone may post one, nobody learns who wrote what. */
  private async blackboard(engine: GameEngine): Promise<void> {
    const posts: string[] = [];
    for (const p of engine.alivePlayers()) {
      const { statement } = await engine.narrator.statement(p.name, {
        kind: 'blackboard',
        prompt: 'You may write one anonymous note on the town blackboard. Reply SKIP to write nothing.',
        context: engine.contextFor(p.name),
        maxLength: BLACKBOARD_MAX,
      });
      if (!isBlankPost(statement)) posts.push(statement);
    }
    for (const post of posts) {
      engine.info.revealToAll(`Anonymous note on the blackboard: "${post}"`, {
        category: 'statement',
        day: engine.day,
        source: 'anonymous',
      });
      engine.recordPublic({ type: 'SYSTEM', content: `[Blackboard] ${post}`, metadata: { kind: 'blackboard' } });
    }
  }

  private publish(engine: GameEngine, s: Statement): void {
    engine.info.revealToAll(formatStatement(s), { category: 'statement', day: s.day, source: s.speaker });
    engine.recordPublic({ type: 'CHAT', player: s.speaker, content: s.content, metadata: { kind: s.phase } });
    engine.logThought(s.speaker, s.thinking);
  }

  /** Each ghost haunting the speaker gets one short remark. */
  private async ghostAsides(engine: GameEngine, s: Statement): Promise<Statement[]> {
    if (s.phase !== 'discussion') return [];
    const asides: Statement[] = [];
    for (const ghost of hauntersOf(engine, s.speaker)) {
      const { statement } = await engine.narrator.statement(ghost, {
        kind: 'ghost_aside',
        prompt: `You are the ghost of ${ghost}, haunting ${s.speaker}, who just said: "${s.content}". Whisper one short eerie remark.`,
        context: engine.contextFor(ghost),
        maxLength: ASIDE_MAX,
      });
      asides.push(
        createStatement({
          speaker: `${ghost} (ghost)`,
          content: statement,
          thinking: '',
          round: s.round,
          phase: 'ghost',
          day: s.day,
          visibility: Visibility.public(),
        })
      );
      logger.log({ type: 'SYSTEM', content: `${ghost}'s ghost answers ${s.speaker}`, metadata: { visibility: 'private' } });
    }
    return asides;
  }
}

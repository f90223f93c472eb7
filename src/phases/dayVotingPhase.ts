import type { GameEngine } from '../engine/gameEngine.js';
import { logger } from '../logger.js';
import { ABSTAIN } from '../voting/votes.js';

/** Secret ballots, then the tally; a single plurality leader is lynched. */
export class DayVotingPhase {
  async run(engine: GameEngine): Promise<void> {
    const day = engine.day;
    engine.recordPublic({ type: 'SYSTEM', content: `--- Day ${day} Voting ---` });

    const result = await engine.votes.conductVote({
      voters: engine.aliveNames(),
      candidatesFor: () => engine.aliveNames(),
      day,
      round: 1,
      prompt: `Day ${day} voting. Choose a player to lynch, or ${ABSTAIN}.`,
      contextFor: name => engine.contextFor(name),
      redirect: (voter, intended) => engine.registry.redirectVote(engine, voter, intended),
      onVote: vote => {
        engine.logThought(vote.voter, vote.reasoning);
        if (vote.originalTarget !== undefined) {
          logger.log({
            type: 'ACTION',
            player: vote.voter,
            content: `vote for ${vote.originalTarget} stumbled onto ${vote.target}`,
            metadata: { target: vote.target, intended: vote.originalTarget, visibility: 'private' },
          });
        }
      },
    });

    // Ballots stay hidden until everyone has voted.
    for (const vote of result.votes) {
      const content = vote.target === ABSTAIN ? 'abstained' : `voted for ${vote.target}`;
      engine.recordPublic({ type: 'VOTE', player: vote.voter, content, metadata: { vote: vote.target } });
      engine.info.revealToAll(`${vote.voter} ${content}.`, { category: 'vote', day, source: vote.voter });
    }
    engine.announce(`Vote tally for Day ${day}:\n${result.formatBreakdown()}`);

    if (result.eliminated !== undefined) {
      const name = result.eliminated;
      const n = result.votesFor(name);
      engine.eliminatePlayer(name, {
        cause: 'lynch',
        privateReason: `Lynched by the town with ${n} vote${n === 1 ? '' : 's'}.`,
        publicReason: `${name} was lynched by the town.`,
      });
    } else if (result.tied) {
      engine.announce(`The vote is tied between ${result.tiedPlayers.join(' and ')}. Nobody is lynched today.`);
    } else {
      engine.announce('Everyone abstained. Nobody is lynched today.');
    }

    engine.applyEffects(await engine.registry.resolvePendingChoices(engine.decisionContext()));
  }
}

import type { DecisionKind, Narrator } from '../agentIo.js';
import { ABSTAIN, VoteResult, VotingHistory, type Vote } from './votes.js';

/** Returns the target a vote ends up on, or undefined to leave it alone. */
export type VoteRedirect = (voter: string, intended: string) => string | undefined;

export interface VoteRequest {
  voters: readonly string[];
  /** Valid choices for one voter; ABSTAIN is offered first. */
  candidatesFor: (voter: string) => string[];
  day: number;
  round: number;
  prompt: string;
  contextFor: (voter: string) => string;
  kind?: DecisionKind;
  redirect?: VoteRedirect;
  onVote?: (vote: Vote) => void;
}

export class VoteService {
  readonly history = new VotingHistory();

  constructor(private readonly narrator: Narrator) {}

  /**
   * Voters are asked one after another and do not see each other's ballots.
   * A redirect is applied after the choice and before the vote is recorded.
   */
  async conductVote(req: VoteRequest): Promise<VoteResult> {
    const votes: Vote[] = [];
    for (const voter of req.voters) {
      const options = [ABSTAIN, ...req.candidatesFor(voter).filter(c => c !== ABSTAIN && c !== voter)];
      const { choice, reasoning } = await this.narrator.chooseWithReasoning(voter, {
        kind: req.kind ?? 'day_vote',
        prompt: req.prompt,
        options,
        context: req.contextFor(voter),
      });

      let vote: Vote = { voter, target: choice, round: req.round, day: req.day, reasoning };
      if (choice !== ABSTAIN && req.redirect) {
        const redirected = req.redirect(voter, choice);
        if (redirected !== undefined) vote = { ...vote, target: redirected, originalTarget: choice };
      }
      votes.push(vote);
      req.onVote?.(vote);
    }

    const result = new VoteResult(votes, req.day, req.round);
    this.history.add(result);
    return result;
  }

  /** Share of rounds where both players voted and picked the same target. */
  analyzeAlignment(a: string, b: string): number {
    let shared = 0;
    let same = 0;
    for (const result of this.history.all) {
      const va = result.votesBy(a);
      const vb = result.votesBy(b);
      if (!va || !vb) continue;
      shared++;
      if (va.target === vb.target) same++;
    }
    return shared === 0 ? 0 : same / shared;
  }

  /** Players ordered by votes received, optionally for one day. */
  voteLeaders(day?: number): Array<[string, number]> {
    const totals = new Map<string, number>();
    const results = day === undefined ? this.history.all : this.history.forDay(day);
    for (const result of results) {
      for (const [target, n] of result.counts) totals.set(target, (totals.get(target) ?? 0) + n);
    }
    return [...totals.entries()].sort((x, y) => y[1] - x[1] || x[0].localeCompare(y[0]));
  }
}

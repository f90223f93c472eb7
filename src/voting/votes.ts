export const ABSTAIN = 'ABSTAIN';

export interface Vote {
  voter: string;
  /** Player name or ABSTAIN. */
  target: string;
  round: number;
  day: number;
  /** What the voter actually chose, kept when a redirect changed it. */
  originalTarget?: string;
  reasoning: string;
}

export function wasRedirected(vote: Vote): boolean {
  return vote.originalTarget !== undefined && vote.originalTarget !== vote.target;
}

export class VoteResult {
  readonly counts: ReadonlyMap<string, number>;
  readonly eliminated?: string;
  readonly tied: boolean;
  readonly tiedPlayers: readonly string[];

  constructor(
    readonly votes: readonly Vote[],
    readonly day: number,
    readonly round: number
  ) {
    const counts = new Map<string, number>();
    for (const v of votes) {
      if (v.target === ABSTAIN) continue;
      counts.set(v.target, (counts.get(v.target) ?? 0) + 1);
    }
    this.counts = counts;

    const max = Math.max(0, ...counts.values());
    const leaders = [...counts.entries()].filter(([, n]) => n === max && n > 0).map(([name]) => name);
    this.tied = leaders.length > 1;
    this.tiedPlayers = this.tied ? leaders : [];
    this.eliminated = leaders.length === 1 ? leaders[0] : undefined;
  }

  get allAbstained(): boolean {
    return this.counts.size === 0;
  }

  votesBy(voter: string): Vote | undefined {
    return this.votes.find(v => v.voter === voter);
  }

  votesFor(target: string): number {
    return this.counts.get(target) ?? 0;
  }

  votersFor(target: string): string[] {
    return this.votes.filter(v => v.target === target).map(v => v.voter);
  }

  get abstainers(): string[] {
    return this.votersFor(ABSTAIN);
  }

  get redirectedVotes(): Vote[] {
    return this.votes.filter(wasRedirected);
  }

  /** Public tally, highest first; redirects stay hidden. */
  formatBreakdown(): string {
    const lines = [...this.counts.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .map(([target, n]) => `${target}: ${n} (${this.votersFor(target).join(', ')})`);
    const abstainers = this.abstainers;
    if (abstainers.length) lines.push(`Abstained: ${abstainers.join(', ')}`);
    return lines.length ? lines.join('\n') : '(no votes)';
  }
}

export class VotingHistory {
  private readonly results: VoteResult[] = [];

  add(result: VoteResult): void {
    this.results.push(result);
  }

  get all(): readonly VoteResult[] {
    return this.results;
  }

  forDay(day: number): VoteResult[] {
    return this.results.filter(r => r.day === day);
  }

  /** Who `voter` voted for, in order. */
  votingPattern(voter: string): string[] {
    return this.results.flatMap(r => {
      const v = r.votesBy(voter);
      return v ? [v.target] : [];
    });
  }

  /** Everyone who ever voted for `target`, once per vote. */
  targetingPattern(target: string): string[] {
    return this.results.flatMap(r => r.votersFor(target));
  }

  countVotesBy(voter: string): number {
    return this.votingPattern(voter).filter(t => t !== ABSTAIN).length;
  }

  countVotesFor(target: string): number {
    return this.targetingPattern(target).length;
  }
}

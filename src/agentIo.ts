import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import type { GameLogEntry } from './types.js';

export type DecisionKind =
  | 'assassin_target'
  | 'doctor_protect'
  | 'detective_investigate'
  | 'vigilante_shoot'
  | 'mad_scientist_experiment'
  | 'bodyguard_protect'
  | 'priest_resurrect'
  | 'ghost_haunt'
  | 'day_vote';

export type StatementKind =
  | 'introduction'
  | 'discussion'
  | 'team_discussion'
  | 'ghost_aside'
  | 'blackboard'
  | 'reflection';

export interface ChoiceRequest {
  kind: DecisionKind;
  prompt: string;
  options: readonly string[];
  context: string;
}

export interface StatementRequest {
  kind: StatementKind;
  prompt: string;
  context: string;
  maxLength: number;
}

export interface ReasonedChoice {
  choice: string;
  reasoning: string;
}

export interface SpokenStatement {
  thinking: string;
  statement: string;
}

/**
 * The raw text-generation collaborator for one player. It may throw, hang,
 * or answer with something that is not among the options.
 */
export interface PlayerAgent {
  generateChoice(req: ChoiceRequest): Promise<ReasonedChoice>;
  generateStatement(req: StatementRequest): Promise<SpokenStatement>;
}

/** What the game core calls. Never throws; always lands on a valid answer. */
export interface Narrator {
  choose(player: string, req: ChoiceRequest): Promise<string>;
  chooseWithReasoning(player: string, req: ChoiceRequest): Promise<ReasonedChoice>;
  statement(player: string, req: StatementRequest): Promise<SpokenStatement>;
}

export interface AgentIOConfig {
  timeoutMs: number;
  maxAttempts: number;
}

const SKIP_WORDS = ['skip', 'pass', 'none', 'no one', 'nobody', 'wait', 'hold', "don't"];

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

/** Exact, then case-insensitive. */
export function matchChoice(raw: string, options: readonly string[]): string | undefined {
  const cleaned = raw.replace(/^["'`]+|["'`]+$/g, '').trim();
  return options.find(o => o === cleaned) ?? options.find(o => o.toLowerCase() === cleaned.toLowerCase());
}

/** Free text such as "I'll pass tonight" maps to a skip option when one is offered. */
export function matchSkip(raw: string, options: readonly string[]): string | undefined {
  const skipOption = options.find(o => o.toLowerCase().startsWith('skip'));
  if (!skipOption) return undefined;
  const lowered = raw.toLowerCase();
  return SKIP_WORDS.some(w => lowered.includes(w)) ? skipOption : undefined;
}

/**
 * Timeouts, retries and deterministic fallbacks around each player's agent.
 * Failures are logged privately and never reach the game loop.
 */
export class AgentIO implements Narrator {
  private readonly cfg: AgentIOConfig;

  constructor(
    private readonly agents: Readonly<Record<string, PlayerAgent>>,
    cfg?: Partial<AgentIOConfig>
  ) {
    this.cfg = {
      timeoutMs: cfg?.timeoutMs ?? 60_000,
      maxAttempts: cfg?.maxAttempts ?? 2,
    };
  }

  async choose(player: string, req: ChoiceRequest): Promise<string> {
    const { choice } = await this.decide(player, req, false);
    return choice;
  }

  async chooseWithReasoning(player: string, req: ChoiceRequest): Promise<ReasonedChoice> {
    return this.decide(player, req, true);
  }

  async statement(player: string, req: StatementRequest): Promise<SpokenStatement> {
    const fallback: SpokenStatement = { thinking: '', statement: `${player} remains silent.` };
    const agent = this.agents[player];
    if (!agent) return fallback;

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
      try {
        const out = await withTimeout(agent.generateStatement(req), this.cfg.timeoutMs);
        const statement = out.statement.trim().slice(0, req.maxLength);
        if (statement) return { thinking: out.thinking.trim(), statement };
        lastError = new Error('Empty statement');
      } catch (err) {
        lastError = err;
      }
      this.logFailure(player, req.kind, attempt, lastError);
    }
    return fallback;
  }

  private async decide(player: string, req: ChoiceRequest, allowSkipWords: boolean): Promise<ReasonedChoice> {
    const fallback: ReasonedChoice = { choice: req.options[0] ?? '', reasoning: '' };
    const agent = this.agents[player];
    if (!agent || req.options.length === 0) return fallback;

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
      try {
        const out = await withTimeout(agent.generateChoice(req), this.cfg.timeoutMs);
        const matched =
          matchChoice(out.choice, req.options) ?? (allowSkipWords ? matchSkip(out.choice, req.options) : undefined);
        if (matched !== undefined) return { choice: matched, reasoning: out.reasoning.trim() };
        lastError = new Error(`Invalid choice "${out.choice}"`);
      } catch (err) {
        lastError = err;
      }
      this.logFailure(player, req.kind, attempt, lastError);
    }
    return fallback;
  }

  private logFailure(player: string, kind: string, attempt: number, err: unknown) {
    logger.log({
      type: 'SYSTEM',
      content: `AgentIO: ${player} ${kind} failed (attempt ${attempt}/${this.cfg.maxAttempts}): ${errorMessage(err)}`,
      metadata: { actor: player, kind, attempt, visibility: 'private' } satisfies GameLogEntry['metadata'],
    });
  }
}

import type { Narrator, StatementKind } from '../agentIo.js';
import type { Visibility } from '../information/information.js';
import type { Rng } from '../utils.js';
import {
  ConversationHistory,
  createStatement,
  type ConversationPhase,
  type Statement,
} from './conversation.js';

const ASSERTIVE = [
  'aggressive', 'bold', 'charismatic', 'cunning', 'manipulative', 'assertive', 'confident',
  'dominant', 'outspoken', 'brash', 'fearless', 'daring', 'provocative', 'confrontational',
];

const RESERVED = [
  'quiet', 'timid', 'cautious', 'nervous', 'anxious', 'reserved', 'shy', 'hesitant',
  'withdrawn', 'meek', 'passive', 'introverted', 'subtle', 'humble',
];

const PERSONALITY_WEIGHT = 0.3;

export interface Participant {
  name: string;
  personality: string;
}

export interface RoundRequest {
  participants: readonly Participant[];
  day: number;
  round: number;
  phase: ConversationPhase;
  kind: StatementKind;
  prompt: string;
  contextFor: (speaker: string) => string;
  visibility: Visibility;
  maxLength?: number;
  /** Keep the given order instead of drawing a speaking order. */
  fixedOrder?: boolean;
  onStatement?: (statement: Statement) => void;
  /** Runs after each turn; returned statements join the round (e.g. ghost asides). */
  afterTurn?: (statement: Statement) => Promise<Statement[]>;
}

export function personalityBias(personality: string): number {
  const lowered = personality.toLowerCase();
  let bias = 0;
  if (ASSERTIVE.some(w => lowered.includes(w))) bias += PERSONALITY_WEIGHT;
  if (RESERVED.some(w => lowered.includes(w))) bias -= PERSONALITY_WEIGHT;
  return bias;
}

export class ConversationService {
  readonly history = new ConversationHistory();

  constructor(
    private readonly narrator: Narrator,
    private readonly rng: Rng
  ) {}

  /** Random base score nudged by personality; highest speaks first. */
  speakingOrder(participants: readonly Participant[]): string[] {
    return participants
      .map(p => ({ name: p.name, score: this.rng() + personalityBias(p.personality) }))
      .sort((a, b) => b.score - a.score)
      .map(p => p.name);
  }

  /**
   * One turn per participant. Speakers learn what was said before them only
   * through `contextFor`, so `onStatement` is where a caller makes each
   * statement known to its audience.
   */
  async conductRound(req: RoundRequest): Promise<Statement[]> {
    const order = req.fixedOrder ? req.participants.map(p => p.name) : this.speakingOrder(req.participants);
    const said: Statement[] = [];

    for (const speaker of order) {
      const { thinking, statement } = await this.narrator.statement(speaker, {
        kind: req.kind,
        prompt: req.prompt,
        context: req.contextFor(speaker),
        maxLength: req.maxLength ?? 500,
      });

      const s = createStatement({
        speaker,
        content: statement,
        thinking,
        round: req.round,
        phase: req.phase,
        day: req.day,
        visibility: req.visibility,
      });
      this.record(s, said, req);

      if (req.afterTurn) {
        for (const extra of await req.afterTurn(s)) this.record(extra, said, req);
      }
    }
    return said;
  }

  private record(s: Statement, said: Statement[], req: RoundRequest) {
    said.push(s);
    this.history.add(s);
    req.onStatement?.(s);
  }
}

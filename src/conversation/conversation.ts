import { randomUUID } from 'crypto';
import type { Visibility } from '../information/information.js';

export type ConversationPhase = 'introduction' | 'discussion' | 'team_discussion' | 'ghost' | 'blackboard' | 'post_game';

export interface Statement {
  id: string;
  speaker: string;
  content: string;
  /** Never shown to other players. */
  thinking: string;
  timestamp: number;
  round: number;
  phase: ConversationPhase;
  day: number;
  visibility: Visibility;
}

export function createStatement(init: Omit<Statement, 'id' | 'timestamp'>): Statement {
  return { id: randomUUID(), timestamp: Date.now(), ...init };
}

export function formatStatement(s: Pick<Statement, 'speaker' | 'content'>): string {
  return `${s.speaker} said: ${s.content}`;
}

export class ConversationHistory {
  private readonly statements: Statement[] = [];
  private readonly byPhaseIndex = new Map<ConversationPhase, Statement[]>();
  private readonly byDayIndex = new Map<number, Statement[]>();

  add(statement: Statement): void {
    this.statements.push(statement);
    push(this.byPhaseIndex, statement.phase, statement);
    push(this.byDayIndex, statement.day, statement);
  }

  get all(): readonly Statement[] {
    return this.statements;
  }

  byPhase(phase: ConversationPhase): Statement[] {
    return [...(this.byPhaseIndex.get(phase) ?? [])];
  }

  byDay(day: number): Statement[] {
    return [...(this.byDayIndex.get(day) ?? [])];
  }

  bySpeaker(speaker: string): Statement[] {
    return this.statements.filter(s => s.speaker === speaker);
  }

  search(text: string): Statement[] {
    const needle = text.toLowerCase();
    return this.statements.filter(s => s.content.toLowerCase().includes(needle));
  }

  /** Statements by either player, in order. */
  between(a: string, b: string): Statement[] {
    return this.statements.filter(s => s.speaker === a || s.speaker === b);
  }
}

function push<K>(index: Map<K, Statement[]>, key: K, s: Statement): void {
  const bucket = index.get(key);
  if (bucket) bucket.push(s);
  else index.set(key, [s]);
}

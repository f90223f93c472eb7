import type { Effect } from '../effects/types.js';
import type { AttackInterception, GameView, NightAttack } from '../eventModifiers/base.js';

export type AttackResult = 'no_target' | 'countered' | 'saved' | 'shielded' | 'killed';

export interface ResolvedAttack {
  attack: NightAttack;
  result: AttackResult;
  effects: Effect[];
  summary: string;
}

/** The event hooks an attack passes through. EventRegistry satisfies this. */
export interface AttackInterceptors {
  counterAttack(view: GameView, attack: NightAttack): AttackInterception | undefined;
  shieldAttack(view: GameView, attack: NightAttack): AttackInterception | undefined;
}

export type InvestigationResult = 'ASSASSIN' | 'NOT_ASSASSIN';

export interface ResolvedInvestigation {
  actor: string;
  target: string;
  result: InvestigationResult;
}

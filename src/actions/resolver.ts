import { publicReveal } from '../effects/types.js';
import type { GameView, NightAttack } from '../eventModifiers/base.js';
import type { Team } from '../types.js';
import type { AttackInterceptors, InvestigationResult, ResolvedAttack, ResolvedInvestigation } from './types.js';

const SAVED_ANNOUNCEMENT = 'Someone was attacked last night but was saved by the Doctor.';

/**
 * One attack, start to finish: counter-attack, then the Doctor, then the
 * Bodyguard, otherwise it lands. Pure; the caller applies the effects.
 */
export function resolveAttack(view: GameView, attack: NightAttack, interceptors: AttackInterceptors): ResolvedAttack {
  const target = view.player(attack.target);
  if (!target || !target.alive) {
    return { attack, result: 'no_target', effects: [], summary: `${attack.target} was already dead.` };
  }

  const counter = interceptors.counterAttack(view, attack);
  if (counter) return { attack, result: 'countered', effects: counter.effects, summary: counter.summary };

  if (attack.protectable && target.hasModifier('protected')) {
    return {
      attack,
      result: 'saved',
      effects: [publicReveal(SAVED_ANNOUNCEMENT, 'role:doctor', 'night_result')],
      summary: `${attack.target} was attacked but the Doctor saved them.`,
    };
  }

  if (attack.protectable) {
    const shield = interceptors.shieldAttack(view, attack);
    if (shield) return { attack, result: 'shielded', effects: shield.effects, summary: shield.summary };
  }

  return { attack, result: 'killed', effects: attack.onHit, summary: `${attack.target} was killed (${attack.source}).` };
}

export function investigate(actor: string, target: string, targetTeam: Team): ResolvedInvestigation {
  return { actor, target, result: targetTeam === 'assassins' ? 'ASSASSIN' : 'NOT_ASSASSIN' };
}

export function describeInvestigation(inv: ResolvedInvestigation): string {
  const verdict: Record<InvestigationResult, string> = {
    ASSASSIN: 'ARE an Assassin',
    NOT_ASSASSIN: 'are NOT an Assassin',
  };
  return `You investigated ${inv.target}. They ${verdict[inv.result]}.`;
}

/** Most-chosen target; ties go to whichever was chosen first. */
export function pluralityTarget(choices: readonly string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const c of choices) counts.set(c, (counts.get(c) ?? 0) + 1);
  let best: string | undefined;
  let bestCount = 0;
  for (const [target, count] of counts) {
    if (count > bestCount) {
      best = target;
      bestCount = count;
    }
  }
  return best;
}

import type { Effect } from '../effects/types.js';
import type { EventKind } from '../types.js';
import type {
  AttackInterception,
  DecisionContext,
  Elimination,
  EventModifier,
  GameView,
  NightAttack,
  PlayerView,
} from './base.js';

/**
 * Setup order is fixed so the shared claimed set resolves the same way every game:
 * single-player statuses first, the two-player Lovers link and the Ghost last.
 */
export const EVENT_SETUP_ORDER: readonly EventKind[] = [
  'suicidal',
  'sleepwalker',
  'insomniac',
  'gun_nut',
  'drunk',
  'jester',
  'priest',
  'bodyguard',
  'zombie',
  'lovers',
  'ghost',
];

export interface NightAttackPlan {
  attacker: string;
  plan: (view: GameView) => NightAttack | undefined;
}

export class EventRegistry {
  private events: EventModifier[] = [];

  register(event: EventModifier): void {
    if (this.has(event.kind)) return;
    this.events.push(event);
    this.events.sort((a, b) => EVENT_SETUP_ORDER.indexOf(a.kind) - EVENT_SETUP_ORDER.indexOf(b.kind));
  }

  has(kind: EventKind): boolean {
    return this.events.some(e => e.kind === kind);
  }

  get active(): readonly EventModifier[] {
    return this.events;
  }

  get kinds(): EventKind[] {
    return this.events.map(e => e.kind);
  }

  /**
   * Runs every setup in order. `apply` lands each event's effects before the next
   * event looks at the table.
   */
  setupAll(view: GameView, apply: (effects: Effect[]) => void): void {
    const claimed = new Set<string>();
    const unclaimed = (): PlayerView[] => view.alivePlayers().filter(p => p.team === 'village' && !claimed.has(p.name));

    for (const event of this.events) {
      const effects = event.setup({ view, unclaimed });
      if (event.claimsPlayers) {
        for (const e of effects) {
          if (e.type === 'add_modifier') claimed.add(e.target);
        }
      }
      apply(effects);
    }
  }

  notifyElimination(view: GameView, elimination: Elimination): Effect[] {
    return this.events.flatMap(e => e.onPlayerEliminated(view, elimination));
  }

  nightStart(view: GameView): Effect[] {
    return this.events.flatMap(e => e.onNightStart(view));
  }

  nightEnd(view: GameView): Effect[] {
    return this.events.flatMap(e => e.onNightEnd(view));
  }

  nightAttackPlans(view: GameView): NightAttackPlan[] {
    const plans: NightAttackPlan[] = [];
    for (const event of this.events) {
      const planAttack = event.planNightAttack?.bind(event);
      if (!event.nightAttackers || !planAttack) continue;
      for (const attacker of event.nightAttackers(view)) {
        plans.push({ attacker, plan: v => planAttack(v, attacker) });
      }
    }
    return plans;
  }

  counterAttack(view: GameView, attack: NightAttack): AttackInterception | undefined {
    for (const event of this.events) {
      const hit = event.counterAttack?.(view, attack);
      if (hit) return hit;
    }
    return undefined;
  }

  shieldAttack(view: GameView, attack: NightAttack): AttackInterception | undefined {
    for (const event of this.events) {
      const hit = event.shieldAttack?.(view, attack);
      if (hit) return hit;
    }
    return undefined;
  }

  /** Interactive hooks run one event at a time, in setup order. */
  async collectNightChoices(ctx: DecisionContext): Promise<Effect[]> {
    const out: Effect[] = [];
    for (const event of this.events) {
      if (event.collectNightChoices) out.push(...(await event.collectNightChoices(ctx)));
    }
    return out;
  }

  async dayStart(ctx: DecisionContext): Promise<Effect[]> {
    const out: Effect[] = [];
    for (const event of this.events) {
      if (event.onDayStart) out.push(...(await event.onDayStart(ctx)));
    }
    return out;
  }

  async resolvePendingChoices(ctx: DecisionContext): Promise<Effect[]> {
    const out: Effect[] = [];
    for (const event of this.events) {
      if (event.resolvePendingChoices) out.push(...(await event.resolvePendingChoices(ctx)));
    }
    return out;
  }

  redirectVote(view: GameView, voter: string, intended: string): string | undefined {
    for (const event of this.events) {
      const target = event.redirectVote?.(view, voter, intended);
      if (target !== undefined) return target;
    }
    return undefined;
  }
}

import { modifierEffect, privateReveal, removeModifierEffect, type Effect } from '../effects/types.js';
import { pickMany } from '../utils.js';
import { BaseEvent, livingWith, type Elimination, type GameView, type SetupContext } from './base.js';

/**
 * Two players, any role, bound together. When one dies the other follows of a
 * broken heart, one full night later: scheduled on death, readied at the next
 * night-start, carried out at that night's end.
 */
export class LoversEvent extends BaseEvent {
  readonly kind = 'lovers';
  readonly name = 'Star-Crossed Lovers';
  readonly description = 'Two villagers share a secret bond. If one dies, the other may not survive the grief.';
  readonly claimsPlayers = false;

  setup(ctx: SetupContext): Effect[] {
    const filter = this.eligibility;
    const pool = ctx.view.alivePlayers().filter(p => !filter || filter(p, ctx.view));
    const [a, b] = pickMany(pool, 2, ctx.view.rng);
    if (!a || !b) return [];
    return [
      modifierEffect(a.name, 'lover', this.source, { data: { partner: b.name } }),
      modifierEffect(b.name, 'lover', this.source, { data: { partner: a.name } }),
      privateReveal(a.name, `You are deeply in love with ${b.name}. If they die, you will die of a broken heart.`, this.source, 'team_info'),
      privateReveal(b.name, `You are deeply in love with ${a.name}. If they die, you will die of a broken heart.`, this.source, 'team_info'),
    ];
  }

  /** Anyone whose lover tag points at the dead player is scheduled, one-way links included. */
  onPlayerEliminated(view: GameView, elimination: Elimination): Effect[] {
    return livingWith(view, 'lover')
      .filter(p => p.getModifier('lover')?.str('partner') === elimination.player)
      .filter(p => !p.hasModifier('pending_heartbreak') && !p.hasModifier('heartbreak_ready'))
      .map(p =>
        modifierEffect(p.name, 'pending_heartbreak', this.source, {
          data: { partner: elimination.player },
          appliedOn: view.day,
        })
      );
  }

  onNightStart(view: GameView): Effect[] {
    return livingWith(view, 'pending_heartbreak').flatMap(p => [
      removeModifierEffect(p.name, 'pending_heartbreak', this.source),
      modifierEffect(p.name, 'heartbreak_ready', this.source, {
        data: { partner: p.getModifier('pending_heartbreak')?.str('partner') ?? null },
        appliedOn: view.day,
      }),
    ]);
  }

  onNightEnd(view: GameView): Effect[] {
    return livingWith(view, 'heartbreak_ready').flatMap(p => [
      removeModifierEffect(p.name, 'heartbreak_ready', this.source),
      {
        type: 'heartbreak_death' as const,
        target: p.name,
        source: this.source,
        partner: p.getModifier('heartbreak_ready')?.str('partner') ?? 'their beloved',
      },
    ]);
  }
}

import { modifierEffect, privateReveal, publicReveal, removeModifierEffect, type Effect } from '../effects/types.js';
import type { Role } from '../types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, livingWith, type GameView, type PlayerView, type SetupContext } from './base.js';

const NIGHT_MOVERS: ReadonlySet<Role> = new Set<Role>(['assassin', 'doctor', 'detective']);

/**
 * Lies awake and sees one person moving each night, then tells the village.
 * The dead move only while risen or about to rise.
 */
export class InsomniacEvent extends BaseEvent {
  readonly kind = 'insomniac';
  readonly name = 'The Insomniac';
  readonly description = 'Someone in the village cannot sleep, and watches the streets at night.';

  setup(ctx: SetupContext): Effect[] {
    const insomniac = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    return insomniac ? [modifierEffect(insomniac.name, 'insomniac', this.source)] : [];
  }

  onNightStart(view: GameView): Effect[] {
    const effects: Effect[] = [];
    for (const insomniac of livingWith(view, 'insomniac')) {
      const seen = pickOne(nightMovers(view, insomniac.name), view.rng);
      if (!seen) continue;
      const wasDead = !seen.alive;
      effects.push(
        modifierEffect(insomniac.name, 'insomniac_sighting', this.source, {
          data: { seen: seen.name, wasDead },
          appliedOn: view.day,
          expiresOn: view.day,
        }),
        privateReveal(
          insomniac.name,
          `I saw ${seen.name}${wasDead ? ' (supposedly dead)' : ''} moving around on Night ${view.day}, but I don't know what they were doing.`,
          this.source
        )
      );
    }
    return effects;
  }

  onNightEnd(view: GameView): Effect[] {
    const effects: Effect[] = [];
    for (const insomniac of livingWith(view, 'insomniac_sighting')) {
      const sighting = insomniac.getModifier('insomniac_sighting');
      const seen = sighting?.str('seen');
      if (!sighting || !seen || sighting.appliedOn !== view.day) continue;
      const tail = sighting.flag('wasDead') ? `, despite ${seen} being dead!` : '.';
      effects.push(
        removeModifierEffect(insomniac.name, 'insomniac_sighting', this.source),
        publicReveal(`${insomniac.name} (Insomniac) reported seeing ${seen} moving at night${tail}`, this.source, 'action')
      );
    }
    return effects;
  }
}

export function nightMovers(view: GameView, insomniac: string): PlayerView[] {
  return view.players().filter(p => {
    if (p.name === insomniac) return false;
    if (!p.alive) return p.hasModifier('zombie') || p.hasModifier('pending_rise');
    return NIGHT_MOVERS.has(p.role) || p.hasModifier('sleepwalker');
  });
}

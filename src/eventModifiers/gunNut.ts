import { modifierEffect, narrate, removeModifierEffect, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, type AttackInterception, type GameView, type NightAttack, type SetupContext } from './base.js';

export const COUNTER_ATTACK_CHANCE = 0.5;

/** Shoots back: half of all attacks on a Gun Nut kill one of the attackers instead. */
export class GunNutEvent extends BaseEvent {
  readonly kind = 'gun_nut';
  readonly name = 'The Gun Nut';
  readonly description = 'Someone in the village sleeps with a loaded gun under their pillow.';

  setup(ctx: SetupContext): Effect[] {
    const gunNut = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    return gunNut ? [modifierEffect(gunNut.name, 'gun_nut', this.source)] : [];
  }

  /**
   * The attacker who gets shot, or undefined when the target isn't armed or misses.
   * Attackers still standing (or risen) are the only ones who can be hit.
   */
  checkCounterAttack(view: GameView, target: string, attackers: readonly string[]): string | undefined {
    if (!view.player(target)?.hasModifier('gun_nut')) return undefined;
    if (view.rng() >= COUNTER_ATTACK_CHANCE) return undefined;
    const standing = attackers.filter(name => {
      const p = view.player(name);
      return p !== undefined && (p.alive || p.hasModifier('zombie'));
    });
    return pickOne(standing, view.rng);
  }

  counterAttack(view: GameView, attack: NightAttack): AttackInterception | undefined {
    const shot = this.checkCounterAttack(view, attack.target, attack.attackers);
    if (shot === undefined) return undefined;

    if (attack.source === 'zombie') {
      return {
        outcome: 'countered',
        summary: `${attack.target} fought off the zombie ${shot}.`,
        effects: [
          removeModifierEffect(shot, 'zombie', this.source),
          narrate(`${attack.target} put the zombie ${shot} down for good.`, this.source),
        ],
      };
    }
    return {
      outcome: 'countered',
      summary: `${attack.target} fought back and killed ${shot}.`,
      effects: [{ type: 'counter_kill', target: shot, source: this.source, gunNut: attack.target }],
    };
  }
}

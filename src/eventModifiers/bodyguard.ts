import { modifierEffect, privateReveal, removeModifierEffect, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import {
  BaseEvent,
  livingWith,
  type AttackInterception,
  type DecisionContext,
  type GameView,
  type NightAttack,
  type SetupContext,
} from './base.js';

/**
 * Guards one player a night. The first time the guarded player is attacked the
 * Bodyguard dies in their place, and the ability is gone for good.
 */
export class BodyguardEvent extends BaseEvent {
  readonly kind = 'bodyguard';
  readonly name = 'The Bodyguard';
  readonly description = 'Someone has sworn to protect another with their life.';

  setup(ctx: SetupContext): Effect[] {
    const guard = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    if (!guard) return [];
    return [
      modifierEffect(guard.name, 'bodyguard', this.source),
      privateReveal(
        guard.name,
        'You are secretly the Bodyguard. Each night you may guard one player; if they are attacked, you die in their place.',
        this.source,
        'team_info'
      ),
    ];
  }

  async collectNightChoices(ctx: DecisionContext): Promise<Effect[]> {
    const effects: Effect[] = [];
    for (const guard of livingWith(ctx.view, 'bodyguard')) {
      const options = ctx.view
        .alivePlayers()
        .filter(p => p.name !== guard.name)
        .map(p => p.name);
      if (options.length === 0) continue;
      const target = await ctx.narrator.choose(guard.name, {
        kind: 'bodyguard_protect',
        prompt: 'Choose one player to guard tonight. If they are attacked, you will die in their place.',
        options,
        context: ctx.contextFor(guard.name),
      });
      effects.push(
        modifierEffect(target, 'guarded', this.source, {
          data: { by: guard.name },
          appliedOn: ctx.view.day,
          expiresOn: ctx.view.day,
        }),
        privateReveal(guard.name, `You are guarding ${target} tonight.`, this.source, 'action')
      );
    }
    return effects;
  }

  shieldAttack(view: GameView, attack: NightAttack): AttackInterception | undefined {
    if (!attack.protectable) return undefined;
    const guardedBy = view.player(attack.target)?.getModifier('guarded')?.str('by');
    if (!guardedBy) return undefined;
    const guard = view.player(guardedBy);
    if (!guard || !guard.alive || !guard.hasModifier('bodyguard')) return undefined;

    return {
      outcome: 'shielded',
      summary: `${guard.name} threw themselves in front of the attack on ${attack.target}.`,
      effects: [
        removeModifierEffect(guard.name, 'bodyguard', this.source),
        removeModifierEffect(attack.target, 'guarded', this.source),
        { type: 'bodyguard_sacrifice', target: guard.name, source: this.source, protectedPlayer: attack.target },
      ],
    };
  }
}

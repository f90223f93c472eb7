import { modifierEffect, privateReveal, removeModifierEffect, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, livingWith, type DecisionContext, type SetupContext } from './base.js';

export const PRIEST_SKIP = 'Skip (keep the resurrection for later)';

/** One resurrection per game, spent during a day. */
export class PriestEvent extends BaseEvent {
  readonly kind = 'priest';
  readonly name = 'The Priest';
  readonly description = 'Someone has the power to bring back the dead...';

  setup(ctx: SetupContext): Effect[] {
    const priest = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    if (!priest) return [];
    return [
      modifierEffect(priest.name, 'priest', this.source),
      modifierEffect(priest.name, 'resurrection_charge', this.source, { data: { charges: 1 } }),
      privateReveal(
        priest.name,
        'You are secretly the Priest. Once per game, during the day, you may bring one dead player back to life.',
        this.source,
        'team_info'
      ),
    ];
  }

  async onDayStart(ctx: DecisionContext): Promise<Effect[]> {
    const dead = ctx.view.players().filter(p => !p.alive);
    if (dead.length === 0) return [];

    for (const priest of livingWith(ctx.view, 'resurrection_charge')) {
      if (!priest.hasModifier('priest')) continue;
      const { choice } = await ctx.narrator.chooseWithReasoning(priest.name, {
        kind: 'priest_resurrect',
        prompt: 'You may resurrect one dead player now. This can only be done once per game.',
        options: [PRIEST_SKIP, ...dead.map(p => p.name)],
        context: ctx.contextFor(priest.name),
      });
      if (choice === PRIEST_SKIP) continue;
      return [
        removeModifierEffect(priest.name, 'resurrection_charge', this.source),
        { type: 'resurrect', target: choice, source: this.source, by: priest.name },
        privateReveal(priest.name, `You spent your resurrection on ${choice}.`, this.source, 'action'),
      ];
    }
    return [];
  }
}

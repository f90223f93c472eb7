import { modifierEffect, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, livingWith, type GameView, type SetupContext } from './base.js';

export const SUICIDE_CHANCE = 0.2;

/** Each night-end, a fresh 20% chance. The public only hears the body was found. */
export class SuicidalEvent extends BaseEvent {
  readonly kind = 'suicidal';
  readonly name = 'Despair';
  readonly description = 'Someone in the village is struggling with dark thoughts.';

  setup(ctx: SetupContext): Effect[] {
    const player = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    return player ? [modifierEffect(player.name, 'suicidal', this.source)] : [];
  }

  onNightEnd(view: GameView): Effect[] {
    return livingWith(view, 'suicidal')
      .filter(() => view.rng() < SUICIDE_CHANCE)
      .map(p => ({ type: 'suicide_death' as const, target: p.name, source: this.source }));
  }
}

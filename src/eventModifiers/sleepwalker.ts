import { modifierEffect, narrate, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, livingWith, type GameView, type SetupContext } from './base.js';

/** Wanders at night. No mechanical effect beyond showing up in Insomniac sightings. */
export class SleepwalkerEvent extends BaseEvent {
  readonly kind = 'sleepwalker';
  readonly name = 'The Sleepwalker';
  readonly description = 'Someone wanders the village at night without knowing it.';

  setup(ctx: SetupContext): Effect[] {
    const walker = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    return walker ? [modifierEffect(walker.name, 'sleepwalker', this.source)] : [];
  }

  onNightStart(view: GameView): Effect[] {
    return livingWith(view, 'sleepwalker').map(p =>
      narrate(`${p.name} is sleepwalking through the village tonight.`, this.source)
    );
  }
}

import { modifierEffect, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, type GameView, type SetupContext } from './base.js';

export class DrunkEvent extends BaseEvent {
  readonly kind = 'drunk';
  readonly name = 'Village Drunk';
  readonly description = 'Someone has had a bit too much to drink. Their vote may not land where they meant it.';

  setup(ctx: SetupContext): Effect[] {
    const drunk = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    return drunk ? [modifierEffect(drunk.name, 'drunk', this.source)] : [];
  }

  /** Any living player, possibly the intended one. */
  redirectVote(view: GameView, voter: string, _intended: string): string | undefined {
    if (!view.player(voter)?.hasModifier('drunk')) return undefined;
    return pickOne(view.alivePlayers(), view.rng)?.name;
  }
}

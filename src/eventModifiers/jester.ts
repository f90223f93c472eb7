import { modifierEffect, privateReveal, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, type Elimination, type GameView, type SetupContext } from './base.js';

/** Wins alone, and ends the game, by being lynched. Night deaths don't count. */
export class JesterEvent extends BaseEvent {
  readonly kind = 'jester';
  readonly name = 'The Jester';
  readonly description = 'A trickster walks among you, and wants nothing more than to be hanged.';

  setup(ctx: SetupContext): Effect[] {
    const jester = pickOne(this.eligiblePool(ctx), ctx.view.rng);
    if (!jester) return [];
    return [
      modifierEffect(jester.name, 'jester', this.source),
      privateReveal(
        jester.name,
        'You are secretly the Jester. If the village lynches you, you alone win the game.',
        this.source,
        'team_info'
      ),
    ];
  }

  onPlayerEliminated(view: GameView, elimination: Elimination): Effect[] {
    if (elimination.cause !== 'lynch') return [];
    if (!view.player(elimination.player)?.hasModifier('jester')) return [];
    return [{ type: 'jester_victory', target: 'game', source: this.source, winner: elimination.player }];
  }
}

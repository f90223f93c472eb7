import { modifierEffect, privateReveal, removeModifierEffect, type Effect } from '../effects/types.js';
import type { Rng } from '../utils.js';
import { BaseEvent, withModifier, type DecisionContext, type Elimination, type GameView, type SetupContext } from './base.js';

/** Independent of the event's own activation probability. */
export const GHOST_CHANCE = 0.1;

export function becomesGhost(rng: Rng): boolean {
  return rng() < GHOST_CHANCE;
}

/**
 * Some of the dead linger. A ghost picks one living player to haunt and speaks up
 * whenever that player does.
 */
export class GhostEvent extends BaseEvent {
  readonly kind = 'ghost';
  readonly name = 'Restless Spirits';
  readonly description = 'The dead do not always rest. Some may linger among the living.';
  readonly claimsPlayers = false;

  setup(_ctx: SetupContext): Effect[] {
    return [];
  }

  onPlayerEliminated(view: GameView, elimination: Elimination): Effect[] {
    if (!becomesGhost(view.rng)) return [];
    return [{ type: 'become_ghost', target: elimination.player, source: this.source }];
  }

  async resolvePendingChoices(ctx: DecisionContext): Promise<Effect[]> {
    const effects: Effect[] = [];
    for (const ghost of withModifier(ctx.view, 'ghost_pending')) {
      const options = ctx.view.alivePlayers().map(p => p.name);
      effects.push(removeModifierEffect(ghost.name, 'ghost_pending', this.source));
      if (options.length === 0) continue;

      const target = await ctx.narrator.choose(ghost.name, {
        kind: 'ghost_haunt',
        prompt: 'You have died but your spirit lingers. Choose one living player to haunt.',
        options,
        context: ctx.contextFor(ghost.name),
      });
      effects.push(
        modifierEffect(ghost.name, 'ghost', this.source, { data: { haunting: target }, appliedOn: ctx.view.day }),
        privateReveal(ghost.name, `You are now haunting ${target}.`, this.source, 'action')
      );
    }
    return effects;
  }
}

/** Ghosts whose haunting target is `speaker`. */
export function hauntersOf(view: GameView, speaker: string): string[] {
  return withModifier(view, 'ghost')
    .filter(p => !p.alive && p.getModifier('ghost')?.str('haunting') === speaker)
    .map(p => p.name);
}

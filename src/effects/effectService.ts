import { GameInvariantError, UnknownEffectError } from '../errors.js';
import { PlayerModifier } from '../players/modifier.js';
import { cloneTable, type PlayerState, type PlayerTable } from '../players/playerState.js';
import type { StateEffect } from './types.js';

/**
 * Applies player-table effects copy-on-write: the input table is never touched.
 */
export class EffectService {
  apply(table: PlayerTable, effect: StateEffect): Map<string, PlayerState> {
    const next = cloneTable(table);
    const player = next.get(effect.target);
    if (!player) {
      throw new GameInvariantError(`Effect ${effect.type} from ${effect.source} targets unknown player "${effect.target}"`);
    }

    switch (effect.type) {
      case 'add_modifier':
        player.addModifier(
          new PlayerModifier({
            type: effect.modifierType,
            source: effect.source,
            data: effect.data,
            expiresOn: effect.expiresOn,
            appliedOn: effect.appliedOn ?? player.currentDay,
          })
        );
        break;
      case 'remove_modifier':
        player.removeModifier(effect.modifierType);
        break;
      case 'kill_player':
        if (!player.alive) break;
        player.alive = false;
        player.addModifier(
          new PlayerModifier({
            type: 'dead',
            source: effect.source,
            data: { cause: effect.cause, day: effect.day },
            appliedOn: effect.day,
          })
        );
        break;
      case 'revive_player':
        if (player.alive) break;
        player.alive = true;
        player.removeModifier('dead');
        break;
      case 'change_role':
        player.role = effect.role;
        break;
      case 'change_team':
        player.team = effect.team;
        break;
      default: {
        const unhandled: never = effect;
        throw new UnknownEffectError(effectTypeOf(unhandled));
      }
    }
    return next;
  }

  applyAll(table: PlayerTable, effects: readonly StateEffect[]): Map<string, PlayerState> {
    let current: Map<string, PlayerState> = cloneTable(table);
    for (const effect of effects) current = this.apply(current, effect);
    return current;
  }
}

/** Best-effort type name of a value that slipped past the Effect union at runtime. */
export function effectTypeOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'type' in value) return String(value.type);
  return String(value);
}

import { modifierEffect, narrate, removeModifierEffect, type Effect } from '../effects/types.js';
import { pickOne } from '../utils.js';
import { BaseEvent, withModifier, type Elimination, type GameView, type NightAttack, type SetupContext } from './base.js';

/**
 * Infected players who die rise at the next night-start and hunt the living.
 * Each kill infects its victim, so outbreaks can chain.
 */
export class ZombieEvent extends BaseEvent {
  readonly kind = 'zombie';
  readonly name = 'Zombie Outbreak';
  readonly description = 'Someone in the village carries an infection. The dead may not stay dead.';

  setup(ctx: SetupContext): Effect[] {
    const carriers = ctx.view.alivePlayers().filter(p => p.role === 'zombie');
    if (carriers.length === 0) {
      const patientZero = pickOne(this.eligiblePool(ctx), ctx.view.rng);
      if (patientZero) carriers.push(patientZero);
    }
    return carriers.map(p => modifierEffect(p.name, 'infected', this.source));
  }

  onPlayerEliminated(view: GameView, elimination: Elimination): Effect[] {
    const p = view.player(elimination.player);
    if (!p || !p.hasModifier('infected')) return [];
    if (p.hasModifier('pending_rise') || p.hasModifier('zombie')) return [];
    return [
      modifierEffect(p.name, 'pending_rise', this.source, { appliedOn: view.day }),
      narrate(`${p.name} was infected. Their grave will not hold them for long.`, this.source),
    ];
  }

  onNightStart(view: GameView): Effect[] {
    return withModifier(view, 'pending_rise')
      .filter(p => !p.alive)
      .flatMap(p => [
        removeModifierEffect(p.name, 'pending_rise', this.source),
        modifierEffect(p.name, 'zombie', this.source, { data: { rose: view.day }, appliedOn: view.day }),
        narrate(`${p.name} has risen as a zombie!`, this.source),
      ]);
  }

  nightAttackers(view: GameView): string[] {
    return activeZombies(view);
  }

  /** Victim is drawn when the attack resolves, so earlier kills this night are accounted for. */
  planNightAttack(view: GameView, zombie: string): NightAttack | undefined {
    if (!activeZombies(view).includes(zombie)) return undefined;
    const victims = view.alivePlayers().filter(p => p.name !== zombie && !p.hasModifier('zombie'));
    const victim = pickOne(victims, view.rng);
    if (!victim) return undefined;
    return {
      source: 'zombie',
      attackers: [zombie],
      target: victim.name,
      protectable: false,
      onHit: [{ type: 'zombie_kill', target: victim.name, source: this.source, zombie }],
    };
  }
}

/** Dead and risen. */
export function activeZombies(view: GameView): string[] {
  return withModifier(view, 'zombie')
    .filter(p => !p.alive)
    .map(p => p.name);
}

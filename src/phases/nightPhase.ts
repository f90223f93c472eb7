import type { GameEngine } from '../engine/gameEngine.js';
import { resolveAttack } from '../actions/resolver.js';
import type { ResolvedAttack } from '../actions/types.js';
import type { Effect } from '../effects/types.js';
import type { NightAttack } from '../eventModifiers/base.js';
import { logger } from '../logger.js';
import { collectAssassinTarget } from '../roleModules/assassins.js';
import { collectInvestigations } from '../roleModules/detective.js';
import { collectDoctorProtection } from '../roleModules/doctor.js';
import { collectExperiments } from '../roleModules/madScientist.js';
import { collectVigilanteShots } from '../roleModules/vigilante.js';

/**
 * Night N: event night-start, reset, role actions in a fixed order, attack
 * resolution, event night-end, then any choices the dead still owe.
 */
export class NightPhase {
  async run(engine: GameEngine): Promise<void> {
    const day = engine.day;
    engine.recordPublic({ type: 'SYSTEM', content: `--- Night ${day} ---` });
    engine.info.revealToAll(`Night ${day} falls over the village.`, { category: 'game_state', day, source: 'game' });
    // Only deaths from here on are reported at dawn.
    engine.pendingDeathReport = [];

    engine.applyEffects(engine.registry.nightStart(engine));
    engine.resetNightState();

    const assassinTarget = await collectAssassinTarget(engine);
    engine.applyEffects(await collectDoctorProtection(engine));
    engine.applyEffects(await collectInvestigations(engine));
    const shots = await collectVigilanteShots(engine);
    for (const shot of shots) engine.applyEffects(shot.effects);
    engine.applyEffects(await collectExperiments(engine));
    engine.applyEffects(await engine.registry.collectNightChoices(engine.decisionContext()));

    const outcomes: ResolvedAttack[] = [];
    if (assassinTarget !== undefined) {
      const attackers = engine.livingTeam('assassins').map(p => p.name);
      outcomes.push(this.resolve(engine, {
        source: 'assassins',
        attackers,
        target: assassinTarget,
        protectable: true,
        onHit: [nightKill(assassinTarget, 'assassins')],
      }));
    }
    for (const shot of shots) {
      outcomes.push(this.resolve(engine, {
        source: 'vigilante',
        attackers: [shot.shooter],
        target: shot.target,
        protectable: true,
        onHit: [nightKill(shot.target, 'vigilante')],
      }));
    }
    for (const { plan } of engine.registry.nightAttackPlans(engine)) {
      const attack = plan(engine);
      if (attack) outcomes.push(this.resolve(engine, attack));
    }

    engine.applyEffects(engine.registry.nightEnd(engine));
    engine.applyEffects(await engine.registry.resolvePendingChoices(engine.decisionContext()));

    if (outcomes.length === 0) {
      logger.log({ type: 'SYSTEM', content: 'Peaceful night. No attacks were made.', metadata: { visibility: 'private' } });
    }
  }

  private resolve(engine: GameEngine, attack: NightAttack): ResolvedAttack {
    const outcome = resolveAttack(engine, attack, engine.registry);
    logger.log({
      type: 'ACTION',
      content: outcome.summary,
      metadata: { target: attack.target, result: outcome.result, source: attack.source, visibility: 'private' },
    });
    engine.applyEffects(outcome.effects);
    return outcome;
  }
}

function nightKill(target: string, killer: 'assassins' | 'vigilante'): Effect {
  return { type: 'night_kill', target, source: killer === 'assassins' ? 'role:assassin' : 'role:vigilante', killer };
}

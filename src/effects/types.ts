import type { InfoCategory } from '../information/information.js';
import type { ModifierData, ModifierType } from '../players/modifier.js';
import type { Role, Team } from '../types.js';

interface EffectBase {
  /** Player name, or "game" for effects on the game as a whole. */
  target: string;
  /** What produced the effect, e.g. "event:lovers". */
  source: string;
}

// --- Applied to the player table by EffectService ---

export interface AddModifierEffect extends EffectBase {
  type: 'add_modifier';
  modifierType: ModifierType;
  data?: ModifierData;
  expiresOn?: number;
  appliedOn?: number;
}

export interface RemoveModifierEffect extends EffectBase {
  type: 'remove_modifier';
  modifierType: ModifierType;
}

export interface KillPlayerEffect extends EffectBase {
  type: 'kill_player';
  cause: string;
  day: number;
}

export interface RevivePlayerEffect extends EffectBase {
  type: 'revive_player';
}

export interface ChangeRoleEffect extends EffectBase {
  type: 'change_role';
  role: Role;
}

export interface ChangeTeamEffect extends EffectBase {
  type: 'change_team';
  team: Team;
}

export type StateEffect =
  | AddModifierEffect
  | RemoveModifierEffect
  | KillPlayerEffect
  | RevivePlayerEffect
  | ChangeRoleEffect
  | ChangeTeamEffect;

// --- Applied by the engine ---

export interface JesterVictoryEffect extends EffectBase {
  type: 'jester_victory';
  winner: string;
}

export interface HeartbreakDeathEffect extends EffectBase {
  type: 'heartbreak_death';
  partner: string;
}

export interface SuicideDeathEffect extends EffectBase {
  type: 'suicide_death';
}

export interface BodyguardSacrificeEffect extends EffectBase {
  type: 'bodyguard_sacrifice';
  protectedPlayer: string;
}

export interface BecomeGhostEffect extends EffectBase {
  type: 'become_ghost';
}

/** A Gun Nut shoots back: `target` is the attacker who dies. */
export interface CounterKillEffect extends EffectBase {
  type: 'counter_kill';
  gunNut: string;
}

/** A night attack that landed; `target` is the victim. */
export interface NightKillEffect extends EffectBase {
  type: 'night_kill';
  killer: 'assassins' | 'vigilante';
}

export interface ZombieKillEffect extends EffectBase {
  type: 'zombie_kill';
  zombie: string;
}

export interface ResurrectEffect extends EffectBase {
  type: 'resurrect';
  by: string;
}

/** Grant a new information record: to everyone, or privately to `target`. */
export interface RevealEffect extends EffectBase {
  type: 'reveal';
  scope: 'public' | 'private';
  content: string;
  category: InfoCategory;
}

/** Operator-facing narration; players learn nothing. */
export interface NarrateEffect extends EffectBase {
  type: 'narrate';
  content: string;
}

export type GameEffect =
  | JesterVictoryEffect
  | HeartbreakDeathEffect
  | SuicideDeathEffect
  | BodyguardSacrificeEffect
  | BecomeGhostEffect
  | CounterKillEffect
  | NightKillEffect
  | ZombieKillEffect
  | ResurrectEffect
  | RevealEffect
  | NarrateEffect;

export type Effect = StateEffect | GameEffect;
export type EffectType = Effect['type'];

const STATE_EFFECT_TYPES: ReadonlySet<string> = new Set<StateEffect['type']>([
  'add_modifier',
  'remove_modifier',
  'kill_player',
  'revive_player',
  'change_role',
  'change_team',
]);

export function isStateEffect(effect: Effect): effect is StateEffect {
  return STATE_EFFECT_TYPES.has(effect.type);
}

export function modifierEffect(
  target: string,
  modifierType: ModifierType,
  source: string,
  opts: { data?: ModifierData; expiresOn?: number; appliedOn?: number } = {}
): AddModifierEffect {
  return { type: 'add_modifier', target, source, modifierType, ...opts };
}

export function removeModifierEffect(target: string, modifierType: ModifierType, source: string): RemoveModifierEffect {
  return { type: 'remove_modifier', target, source, modifierType };
}

export function deathEffect(target: string, cause: string, source: string, day: number): KillPlayerEffect {
  return { type: 'kill_player', target, source, cause, day };
}

export function roleChangeEffect(target: string, role: Role, source: string): ChangeRoleEffect {
  return { type: 'change_role', target, source, role };
}

export function publicReveal(content: string, source: string, category: InfoCategory = 'game_state'): RevealEffect {
  return { type: 'reveal', target: 'game', source, scope: 'public', content, category };
}

export function privateReveal(
  player: string,
  content: string,
  source: string,
  category: InfoCategory = 'night_result'
): RevealEffect {
  return { type: 'reveal', target: player, source, scope: 'private', content, category };
}

export function narrate(content: string, source: string): NarrateEffect {
  return { type: 'narrate', target: 'game', source, content };
}

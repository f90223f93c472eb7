import { displayName, teamOf } from '../roles.js';
import type { Role, Team } from '../types.js';
import { PlayerModifier, type ModifierType } from './modifier.js';

export interface PlayerInit {
  name: string;
  role: Role;
  team?: Team;
  personality?: string;
  alive?: boolean;
  day?: number;
}

/**
 * A player's identity plus the bag of modifiers that carries every soft status.
 * Active modifiers are keyed by type; replaced or removed ones move to `history`.
 */
export class PlayerState {
  readonly name: string;
  readonly personality: string;
  role: Role;
  team: Team;
  alive: boolean;
  currentDay: number;
  private active = new Map<ModifierType, PlayerModifier>();
  private retired: PlayerModifier[] = [];

  constructor(init: PlayerInit) {
    this.name = init.name;
    this.role = init.role;
    this.team = init.team ?? teamOf(init.role);
    this.personality = init.personality ?? '';
    this.alive = init.alive ?? true;
    this.currentDay = init.day ?? 1;
  }

  hasModifier(type: ModifierType): boolean {
    return this.getModifier(type) !== undefined;
  }

  getModifier(type: ModifierType): PlayerModifier | undefined {
    const mod = this.active.get(type);
    return mod && mod.isLive(this.currentDay) ? mod : undefined;
  }

  /** Replaces an existing modifier of the same type. */
  addModifier(mod: PlayerModifier): void {
    const previous = this.active.get(mod.type);
    if (previous) this.retired.push(previous.deactivated());
    this.active.set(mod.type, mod);
  }

  removeModifier(type: ModifierType): boolean {
    const mod = this.active.get(type);
    if (!mod) return false;
    this.active.delete(type);
    this.retired.push(mod.deactivated());
    return mod.isLive(this.currentDay);
  }

  /** Deactivates everything whose last day is before `day`. */
  updateModifiers(day: number): PlayerModifier[] {
    this.currentDay = day;
    const expired: PlayerModifier[] = [];
    for (const [type, mod] of this.active) {
      if (!mod.isExpired(day)) continue;
      this.active.delete(type);
      this.retired.push(mod.deactivated());
      expired.push(mod);
    }
    return expired;
  }

  get modifiers(): PlayerModifier[] {
    return [...this.active.values()].filter(m => m.isLive(this.currentDay));
  }

  get history(): readonly PlayerModifier[] {
    return this.retired;
  }

  /** Infected players read as villagers while alive and as zombies once dead. */
  get displayRole(): string {
    if (this.hasModifier('zombie')) return 'Zombie';
    if (this.hasModifier('infected')) return this.alive ? 'Villager (Infected)' : 'Zombie';
    return displayName(this.role);
  }

  get roleDisplayWithArticle(): string {
    const name = this.displayRole;
    return /^[aeiou]/i.test(name) ? `an ${name}` : `a ${name}`;
  }

  clone(): PlayerState {
    const copy = new PlayerState({
      name: this.name,
      role: this.role,
      team: this.team,
      personality: this.personality,
      alive: this.alive,
      day: this.currentDay,
    });
    copy.active = new Map(this.active);
    copy.retired = [...this.retired];
    return copy;
  }
}

export type PlayerTable = ReadonlyMap<string, PlayerState>;

export function cloneTable(table: PlayerTable): Map<string, PlayerState> {
  const out = new Map<string, PlayerState>();
  for (const [name, p] of table) out.set(name, p.clone());
  return out;
}

import { RoleSchema, type Role, type Team } from './types.js';

export interface RoleDefinition {
  id: Role;
  displayName: string;
  team: Team;
  actsAtNight: boolean;
  description: string;
}

export const ROLE_DEFINITIONS: Record<Role, RoleDefinition> = {
  assassin: {
    id: 'assassin',
    displayName: 'Assassin',
    team: 'assassins',
    actsAtNight: true,
    description:
      'You are one of the Assassins. Each night, you and your fellow Assassins choose a villager to eliminate. ' +
      'During the day, blend in with the villagers and avoid being voted out. ' +
      'You win when the Assassins equal or outnumber the villagers.',
  },
  doctor: {
    id: 'doctor',
    displayName: 'Doctor',
    team: 'village',
    actsAtNight: true,
    description:
      'You are the Doctor. Each night, you may protect one player from being eliminated. ' +
      'You cannot protect the same player two nights in a row. ' +
      'You win when all Assassins are eliminated.',
  },
  detective: {
    id: 'detective',
    displayName: 'Detective',
    team: 'village',
    actsAtNight: true,
    description:
      'You are the Detective. Each night, you may investigate one player to learn whether they are an Assassin. ' +
      'Use this information wisely to help the village. ' +
      'You win when all Assassins are eliminated.',
  },
  vigilante: {
    id: 'vigilante',
    displayName: 'Vigilante',
    team: 'village',
    actsAtNight: true,
    description:
      'You are the Vigilante. Once per game, during the night, you may choose to eliminate one player. ' +
      'Use this power carefully, as you might accidentally kill an innocent villager. ' +
      'You win when all Assassins are eliminated.',
  },
  mad_scientist: {
    id: 'mad_scientist',
    displayName: 'Mad Scientist',
    team: 'village',
    actsAtNight: true,
    description:
      'You are the Mad Scientist. Each night, you experiment on one player with unpredictable results: ' +
      'a truth serum that exposes their role, or a strange side effect. ' +
      'You win when all Assassins are eliminated.',
  },
  zombie: {
    id: 'zombie',
    displayName: 'Zombie',
    team: 'village',
    actsAtNight: false,
    description:
      'You are secretly infected. You appear as a regular villager and win with the village, ' +
      'but if you die you will rise at night and attack the living.',
  },
  villager: {
    id: 'villager',
    displayName: 'Villager',
    team: 'village',
    actsAtNight: false,
    description:
      'You are a Villager. You have no special abilities, but your vote and voice are important. ' +
      'Work with other villagers to identify and eliminate the Assassins. ' +
      'You win when all Assassins are eliminated.',
  },
};

export const POWER_ROLES: readonly Role[] = ['doctor', 'detective', 'vigilante', 'mad_scientist'];

export function getRoleDefinition(role: Role): RoleDefinition {
  return ROLE_DEFINITIONS[role];
}

export function teamOf(role: Role): Team {
  return ROLE_DEFINITIONS[role].team;
}

export function displayName(role: Role): string {
  return ROLE_DEFINITIONS[role].displayName;
}

/** "an Assassin", "a Doctor". */
export function displayWithArticle(role: Role): string {
  const name = displayName(role);
  return /^[aeiou]/i.test(name) ? `an ${name}` : `a ${name}`;
}

export function actsAtNight(role: Role): boolean {
  return ROLE_DEFINITIONS[role].actsAtNight;
}

/**
 * Default seat distribution: at least two Assassins (a third of the table),
 * up to four power roles, villagers for the rest.
 */
export function defaultRoleList(playerCount: number): Role[] {
  const assassins = Math.max(2, Math.floor(playerCount / 3));
  const powerCount = Math.max(0, Math.min(POWER_ROLES.length, playerCount - assassins - 1));
  const roles: Role[] = [];
  for (let i = 0; i < assassins; i++) roles.push('assassin');
  roles.push(...POWER_ROLES.slice(0, powerCount));
  while (roles.length < playerCount) roles.push('villager');
  return roles;
}

export function formatRoleSetupForPublicLog(counts: Partial<Record<Role, number>>): string {
  const parts = RoleSchema.options
    .filter(role => (counts[role] ?? 0) > 0)
    .map(role => `${displayName(role)} x${counts[role] ?? 0}`);
  return parts.length ? parts.join(', ') : '(none)';
}

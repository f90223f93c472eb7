import type { PlayerView } from './eventModifiers/base.js';
import { getRoleDefinition } from './roles.js';
import type { Phase } from './types.js';

/** What a player privately knows about their own seat. Put in the system prompt. */
export function roleBriefing(player: Pick<PlayerView, 'role' | 'team'>): string {
  const def = getRoleDefinition(player.role);
  return `Your Role: ${def.displayName} (team: ${player.team})\n${def.description}`;
}

/** One line per status a player is aware of. Infection and drunkenness stay hidden. */
export function statusLines(player: PlayerView): string[] {
  const lines: string[] = [];
  if (!player.alive) lines.push('You are dead. You can no longer vote or act.');
  if (player.hasModifier('ghost')) {
    const haunting = player.getModifier('ghost')?.str('haunting');
    lines.push(haunting ? `You are a ghost haunting ${haunting}.` : 'You are a restless ghost.');
  }
  const partner = player.getModifier('lover')?.str('partner');
  if (partner) lines.push(`You are in love with ${partner}. If they die, you will die of a broken heart.`);
  if (player.hasModifier('jester')) lines.push('You are secretly the Jester: you win alone if the town lynches you.');
  if (player.hasModifier('resurrection_charge')) lines.push('You are the Priest and can still resurrect one dead player.');
  else if (player.hasModifier('priest')) lines.push('You are the Priest. Your resurrection has been used.');
  if (player.hasModifier('bodyguard')) lines.push('You are the Bodyguard: each night you may guard one player.');
  if (player.hasModifier('gun_nut')) lines.push('You keep a loaded gun under your pillow.');
  if (player.hasModifier('insomniac')) lines.push('You cannot sleep and watch the streets at night.');
  if (player.role === 'vigilante') {
    lines.push(player.hasModifier('vigilante_used') ? 'Your one shot has been used.' : 'You still have your one shot.');
  }
  const last = player.getModifier('last_protected')?.str('target');
  if (last) lines.push(`You protected ${last} last night and cannot protect them again tonight.`);
  return lines;
}

export interface SituationInput {
  player: PlayerView;
  day: number;
  phase: Phase;
  alive: readonly string[];
  dead: readonly string[];
  knowledge: string;
}

/** The per-request user context: where we are, who is left, and everything this player knows. */
export function situationContext(input: SituationInput): string {
  const { player, day, phase, alive, dead, knowledge } = input;
  const status = statusLines(player);
  return [
    `You are ${player.name}. It is ${phase === 'night' ? 'Night' : 'Day'} ${day}.`,
    `Alive players: ${alive.join(', ')}.`,
    dead.length ? `Dead players: ${dead.join(', ')}.` : '',
    status.length ? `Your status:\n${status.map(s => `- ${s}`).join('\n')}` : '',
    knowledge ? `What you know:\n${knowledge}` : 'What you know: nothing yet.',
  ]
    .filter(Boolean)
    .join('\n\n');
}

import { Agent } from '../agent.js';
import { AgentIO, type Narrator, type PlayerAgent } from '../agentIo.js';
import { ConfigError } from '../errors.js';
import { buildEventRegistry } from '../eventModifiers/index.js';
import { logger } from '../logger.js';
import { defaultRoleList, formatRoleSetupForPublicLog } from '../roles.js';
import type { GameConfig, PlayerConfig, Role } from '../types.js';
import { mulberry32, shuffled, type Rng } from '../utils.js';
import { GameEngine, type Seat } from './gameEngine.js';

export interface CreateGameOptions {
  /** Defaults to language-model agents for the seated roster. */
  narrator?: Narrator;
  /** Defaults to `mulberry32(config.seed)`, or a time seed when the config has none. */
  rng?: Rng;
}

export function seatedRoster(config: GameConfig): PlayerConfig[] {
  return config.players.slice(0, config.player_count ?? config.players.length);
}

/**
 * Forced roles must name every seated player and nobody else.
 * Without them the default distribution is shuffled over the seats.
 */
export function assignRoles(config: GameConfig, rng: Rng): Seat[] {
  const roster = seatedRoster(config);
  const forced = config.roles;

  if (forced) {
    const seated = new Set(roster.map(p => p.name));
    const unknown = Object.keys(forced).filter(n => !seated.has(n));
    if (unknown.length) throw new ConfigError(`Forced roles name players who are not seated: ${unknown.join(', ')}`);
    return roster.map(p => {
      const role = forced[p.name];
      if (!role) throw new ConfigError(`Forced roles do not cover ${p.name}`);
      return { name: p.name, role, personality: p.personality };
    });
  }

  const roles = shuffled(defaultRoleList(roster.length), rng);
  return roster.map((p, i) => ({ name: p.name, role: roles[i] ?? 'villager', personality: p.personality }));
}

export function roleCounts(seats: readonly Seat[]): Partial<Record<Role, number>> {
  const counts: Partial<Record<Role, number>> = {};
  for (const s of seats) counts[s.role] = (counts[s.role] ?? 0) + 1;
  return counts;
}

/**
 * Language-model players for the seated roster, wrapped in AgentIO.
 * Each agent's system prompt carries the rules and the public role setup.
 */
export function buildPlayers(config: GameConfig, seats: readonly Seat[]): { agents: Record<string, Agent>; io: AgentIO } {
  const gameRules = `${config.system_prompt.trim()}\n\nRoles in this game: ${formatRoleSetupForPublicLog(roleCounts(seats))}`;
  const agents: Record<string, Agent> = {};
  for (const p of seatedRoster(config)) {
    agents[p.name] = new Agent(p, { gameRules, logThoughts: config.log_thoughts });
  }
  const players: Record<string, PlayerAgent> = agents;
  const io = new AgentIO(players, { timeoutMs: config.agent_timeout_ms, maxAttempts: config.agent_max_attempts });
  return { agents, io };
}

/** Seats the table, activates events and runs their setup. */
export function createGame(config: GameConfig, opts: CreateGameOptions = {}): GameEngine {
  const seed = config.seed ?? Date.now();
  const rng = opts.rng ?? mulberry32(seed);
  const seats = assignRoles(config, rng);
  const registry = buildEventRegistry(config, rng);

  logger.log({
    type: 'SYSTEM',
    content: `Role setup: ${formatRoleSetupForPublicLog(roleCounts(seats))}`,
    metadata: { visibility: 'private', seed },
  });

  const players = opts.narrator ? undefined : buildPlayers(config, seats);
  const narrator = opts.narrator ?? players?.io;
  if (!narrator) throw new ConfigError('No narrator available for the game');

  const engine = new GameEngine(config, seats, { narrator, registry, rng });
  engine.initialize();
  for (const [name, agent] of Object.entries(players?.agents ?? {})) agent.setRoleBriefing(engine.briefingFor(name));
  return engine;
}

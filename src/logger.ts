import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogType, Role } from './types.js';
import { eventBus } from './events/index.js';

const ROLE_COLORS: Record<Role, (text: string) => string> = {
  assassin: chalk.red,
  villager: chalk.green,
  detective: chalk.blue,
  doctor: chalk.cyan,
  vigilante: chalk.magenta,
  mad_scientist: chalk.yellowBright,
  zombie: chalk.gray,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  CHAT: chalk.white,
  ACTION: chalk.yellow,
  VOTE: chalk.blue,
  DEATH: chalk.bgRed.white,
  WIN: chalk.green.bold,
  THOUGHT: chalk.gray.italic,
  TEAM_CHAT: chalk.red,
};

const ROLE_WORDS: Record<string, Role> = {
  assassin: 'assassin',
  villager: 'villager',
  detective: 'detective',
  doctor: 'doctor',
  vigilante: 'vigilante',
  mad_scientist: 'mad_scientist',
  zombie: 'zombie',
};

const ROLE_PATTERN = /\b(assassin|villager|detective|doctor|vigilante|mad[ _]scientist|zombie)s?\b/gi;

/** Wraps each role word (singular or plural, "Mad Scientist" or "mad_scientist") with `paint`. */
export function highlightRoles(
  content: string,
  paint: (role: Role, text: string) => string = (role, text) => ROLE_COLORS[role](text)
): string {
  return content.replace(ROLE_PATTERN, match => {
    const role = ROLE_WORDS[match.toLowerCase().replace(' ', '_').replace(/s$/, '')];
    return role ? paint(role, match) : match;
  });
}

function isTruthyFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export class GameLogger {
  private logFile?: string;
  private transcriptFile?: string;
  private logs: GameLogEntry[] = [];
  private knownPlayers: Set<string> = new Set();
  private consoleOutputEnabled = true;
  private persistenceEnabled = false;
  private playerRoles: Map<string, Role> = new Map();

  constructor() {
    // The logger subscribes to the global event bus and persists/prints entries.
    eventBus.subscribe(entry => {
      this.handleEntry(entry);
    });
  }

  /**
   * Enable writing structured logs and a public transcript under `logs/`.
   * Files are created on the first write after enabling.
   */
  setPersistenceEnabled(enabled: boolean, dir = path.join(process.cwd(), 'logs')) {
    this.persistenceEnabled = enabled;
    if (!enabled) return;
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(dir, `game-${timestamp}.json`);
    this.transcriptFile = path.join(dir, `transcript-${timestamp}.txt`);
  }

  setKnownPlayers(names: string[]) {
    this.knownPlayers = new Set(names);
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  setPlayerRoles(roles: Record<string, Role>) {
    this.playerRoles = new Map(Object.entries(roles));
  }

  setPlayerRole(player: string, role: Role) {
    this.playerRoles.set(player, role);
  }

  getLogs(): GameLogEntry[] {
    return this.logs.slice();
  }

  clear() {
    this.logs = [];
  }

  /**
   * Emit a log entry to the global event bus, returning the fully materialized entry.
   * Callers should not mutate the returned object.
   */
  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    eventBus.emit(enriched);
    return enriched;
  }

  private enrichEntry(entry: GameLogEntry): GameLogEntry {
    // An explicit 'role' key in metadata (even undefined) disables inference.
    const hasRoleProperty = entry.metadata !== undefined && 'role' in entry.metadata;
    const inferredRole = entry.player && !hasRoleProperty ? this.playerRoles.get(entry.player) : undefined;
    if (inferredRole === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), role: inferredRole },
    };
  }

  private handleEntry(entry: GameLogEntry) {
    this.logs.push(entry);
    this.flush();

    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'THOUGHT' && !isTruthyFlag(process.env.ASSASSINS_PRINT_THOUGHTS)) return;

    console.log(this.formatLine(entry));
  }

  formatLine(entry: GameLogEntry): string {
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const role = entry.metadata?.role ?? this.playerRoles.get(entry.player);
      const roleStr = role ? ` ${ROLE_COLORS[role](role)}` : '';
      playerInfo = ` <${chalk.hex('#FFA500')(entry.player)}${roleStr}>`;
    }

    let content = highlightRoles(entry.content);

    if (this.knownPlayers.size > 0) {
      const names = Array.from(this.knownPlayers).map(n => n.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      const playerPattern = new RegExp(`\\b(${names.join('|')})\\b`, 'g');
      content = content.replace(playerPattern, match => chalk.hex('#FFA500')(match));
    }

    return `${prefix} ${typeStr}${playerInfo}: ${content}`;
  }

  private flush() {
    if (!this.persistenceEnabled || !this.logFile || !this.transcriptFile) return;
    fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    fs.writeFileSync(this.logFile, JSON.stringify(this.logs, null, 2));
    fs.writeFileSync(this.transcriptFile, buildTranscriptText(this.logs));
  }
}

/**
 * Public transcript: only entries every player could have seen.
 * Absent visibility falls back to an include-list of public log types.
 */
export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    if (entry.type === 'THOUGHT' || entry.type === 'TEAM_CHAT') continue;
    const visibility = entry.metadata?.visibility;
    if (visibility !== undefined && visibility !== 'public') continue;
    if (visibility === undefined && entry.type === 'ACTION') continue;

    switch (entry.type) {
      case 'CHAT':
        lines.push(entry.player ? `${entry.player}: ${entry.content}` : `[CHAT] ${entry.content}`);
        break;
      case 'VOTE':
      case 'DEATH':
        lines.push(`[${entry.type}] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd());
        break;
      default:
        lines.push(`[${entry.type}] ${entry.content}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export const logger = new GameLogger();

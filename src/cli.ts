import type { ConfigOverrides } from './config.js';
import { ConfigError } from './errors.js';
import type { EventKind } from './types.js';

export const EVENT_FLAGS: Record<string, EventKind> = {
  '--zombie': 'zombie',
  '--ghost': 'ghost',
  '--sleepwalker': 'sleepwalker',
  '--insomniac': 'insomniac',
  '--gun-nut': 'gun_nut',
  '--suicidal': 'suicidal',
  '--drunk': 'drunk',
  '--jester': 'jester',
  '--priest': 'priest',
  '--lovers': 'lovers',
  '--bodyguard': 'bodyguard',
};

export interface CliArgs {
  configFile: string;
  dryRun: boolean;
  saveLogs: boolean;
  overrides: ConfigOverrides;
}

function numberArg(flag: string, next: string | undefined): number {
  if (next === undefined) throw new ConfigError(`Missing value for ${flag}`);
  const n = Number(next);
  if (!Number.isFinite(n)) throw new ConfigError(`Invalid value "${next}" for ${flag}`);
  return n;
}

export function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let dryRun = false;
  let saveLogs = false;
  const overrides: ConfigOverrides = {};
  const events: Partial<Record<EventKind, boolean>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    // Package managers often forward a literal `--`.
    if (arg === '--') continue;

    const event = EVENT_FLAGS[arg];
    if (event) {
      events[event] = true;
      continue;
    }

    switch (arg) {
      case '--dry-run':
        dryRun = true;
        continue;
      case '--save-logs':
        saveLogs = true;
        continue;
      case '--chaos':
        overrides.chaos = true;
        continue;
      case '--random-events':
        overrides.random_events = true;
        continue;
      case '--seed':
        overrides.seed = numberArg(arg, argv[++i]);
        continue;
      case '--players':
        overrides.player_count = numberArg(arg, argv[++i]);
        continue;
      case '--delay':
        overrides.delay_seconds = numberArg(arg, argv[++i]);
        continue;
      case '--config': {
        const next = argv[++i];
        if (!next) throw new ConfigError('Missing value for --config');
        configFile = next;
        continue;
      }
    }

    if (arg.startsWith('-')) throw new ConfigError(`Unknown argument: ${arg}`);

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  if (Object.keys(events).length) overrides.events = events;
  return { configFile: configFile ?? 'game-config.yaml', dryRun, saveLogs, overrides };
}

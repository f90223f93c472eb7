import * as fs from 'fs';
import * as yaml from 'yaml';
import { ZodError } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { GameConfigSchema, type EventKind, type GameConfig } from './types.js';

/** Values the CLI lays over the file before validation. */
export interface ConfigOverrides {
  seed?: number;
  player_count?: number;
  delay_seconds?: number;
  chaos?: boolean;
  random_events?: boolean;
  events?: Partial<Record<EventKind, boolean>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function applyOverrides(raw: Record<string, unknown>, overrides: ConfigOverrides): Record<string, unknown> {
  const { events, ...scalars } = overrides;
  const merged: Record<string, unknown> = { ...raw };
  for (const [key, value] of Object.entries(scalars)) {
    if (value !== undefined) merged[key] = value;
  }
  if (events && Object.keys(events).length) {
    merged.events = { ...(isRecord(raw.events) ? raw.events : {}), ...events };
  }
  return merged;
}

/** Validates an already-parsed document. */
export function parseConfig(raw: unknown, overrides: ConfigOverrides = {}): GameConfig {
  if (!isRecord(raw)) throw new ConfigError('Configuration must be a YAML mapping');
  const result = GameConfigSchema.safeParse(applyOverrides(raw, overrides));
  if (!result.success) throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  return result.data;
}

export function loadConfig(configPath: string, overrides: ConfigOverrides = {}): GameConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}`, metadata: { visibility: 'private' } });

  let parsedYaml: unknown;
  try {
    parsedYaml = yaml.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  const config = parseConfig(parsedYaml, overrides);
  logger.log({
    type: 'SYSTEM',
    content: 'Configuration loaded and validated successfully.',
    metadata: { visibility: 'private' },
  });
  return config;
}

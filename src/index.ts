#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { parseArgs } from './cli.js';
import { loadConfig } from './config.js';
import { createGame } from './engine/setup.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';

async function main(): Promise<number> {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));

  if (args.dryRun) {
    process.env.ASSASSINS_DRY_RUN = '1';
    if (args.overrides.seed !== undefined) process.env.ASSASSINS_DRY_RUN_SEED = String(args.overrides.seed);
    logger.log({
      type: 'SYSTEM',
      content: `Dry-run mode enabled (seed: ${process.env.ASSASSINS_DRY_RUN_SEED ?? 'default'})`,
    });
  }

  // Fail fast on missing auth for the gateway, except in dry-run mode.
  if (!args.dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new ConfigError(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  if (args.saveLogs) logger.setPersistenceEnabled(true);

  const config = loadConfig(path.resolve(process.cwd(), args.configFile), args.overrides);
  const engine = createGame(config);

  const controller = new AbortController();
  const stop = () => {
    logger.log({ type: 'SYSTEM', content: 'Interrupt received; stopping after the current step.' });
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await engine.start(controller.signal);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }

  if (engine.gameOver || engine.interrupted) return 0;
  return 1;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof ConfigError ? 'Configuration error:' : 'Fatal Error:', errorMessage(error));
    process.exitCode = 1;
  }
);

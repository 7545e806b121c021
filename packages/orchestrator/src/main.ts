#!/usr/bin/env tsx
/**
 * Entry point: load .env, validate configuration, run the pipeline once.
 *
 * Exit codes:
 * - 0 once the pipeline has run, whatever the step outcomes
 * - 1 when configuration cannot be loaded
 */

// Load environment variables from .env file
import 'dotenv/config';

import { pathToFileURL } from 'node:url';
import { EspDemoApp, EspDemoDependencies } from './app.js';
import { EnvConfigError, loadConfigFromEnv } from './config.js';
import type { EnvSource, EspDemoConfig } from './config.js';
import { createLogger } from './utils/logger.js';

export async function main(
  env: EnvSource = process.env,
  deps: EspDemoDependencies = {}
): Promise<number> {
  let config: Readonly<EspDemoConfig>;
  try {
    config = loadConfigFromEnv(env);
  } catch (error) {
    const logger = createLogger({
      sink: deps.logSink ?? ((line) => process.stderr.write(`${line}\n`)),
    });
    if (error instanceof EnvConfigError) {
      logger.error({ issues: error.issues }, 'Invalid configuration');
      return 1;
    }
    throw error;
  }

  await new EspDemoApp(config, deps).run();
  return 0;
}

// Run if this is the main module
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('Fatal error:', err);
      process.exit(1);
    }
  );
}

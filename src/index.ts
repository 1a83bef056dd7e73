#!/usr/bin/env node
// Loaded first so LOG_LEVEL and friends are set before the logger is created
import 'dotenv/config';
import { createCLI } from './cli.js';
import { loadConfig } from './config/env.js';
import { createOrchestrator } from './orchestrator.js';
import logger, { configureLogger } from './utils/logger.js';

/**
 * Entry point of tenantctl
 */
async function main(): Promise<void> {
  const program = createCLI({
    open: () => {
      const config = loadConfig();
      configureLogger({ level: config.LOG_LEVEL, format: config.LOG_FORMAT });
      const orchestrator = createOrchestrator(config);
      return { ...orchestrator, healthUrl: config.HEALTH_URL };
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error('tenantctl failed', { error });
  process.exitCode = 1;
});

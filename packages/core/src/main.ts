/**
 * Agent entry point
 */

import { MonitoringAgent } from './agent.js';
import { loadAgentConfig } from './env.js';
import { createLogger } from './logger.js';

const logger = createLogger({ name: 'main' });

async function main(): Promise<void> {
  const config = loadAgentConfig();
  const agent = MonitoringAgent.create(config);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    agent.shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const run = await agent.start();
  try {
    await run.done;
  } catch (error) {
    await agent.shutdown();
    throw error;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Agent failed');
  process.exitCode = 1;
});

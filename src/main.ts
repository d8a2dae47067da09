#!/usr/bin/env node
import { loadConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { createOriginAgent } from './origin/client.js';
import { buildServer } from './server.js';
import { ConfigurationError, type ChaffGateConfig } from './types/index.js';

async function main(): Promise<void> {
  const logger = createLogger();

  let config: ChaffGateConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, error.message);
      process.exit(1);
    }
    throw error;
  }

  logger.info('ChaffGate starting...');

  const agent = createOriginAgent(config.upstream);
  const app = await buildServer(config, { logger, dispatcher: agent });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await agent.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(error => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(
      { upstream: config.upstream.baseUrl },
      `ChaffGate listening on ${config.server.host}:${config.server.port}`
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    await agent.close();
    process.exit(1);
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});

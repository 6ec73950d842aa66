/**
 * Process entry: load .env, validate configuration, listen, close on signals
 */
import { config as loadDotenv } from 'dotenv';
import { createLogger } from '@apigw/logger';
import { buildApp } from './app.mjs';
import { loadConfig } from './config.mjs';

loadDotenv();

const config = loadConfig();
const logger = createLogger({ name: 'api-gateway', level: config.logLevel, pretty: config.logPretty });
const app = await buildApp({ config, logger });

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  });
}

try {
  await app.listen({ host: config.host, port: config.port });
} catch (error) {
  logger.fatal({ err: error }, 'Gateway failed to start');
  process.exit(1);
}

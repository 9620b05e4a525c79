import { createServices } from '@/container.js';
import { createHttpApp } from '@/infrastructure/http/index.js';
import { loadConfig } from '@/shared/config/env.js';
import { createChildLogger, rootLogger } from '@/shared/logger/pino.js';

const logger = createChildLogger({ module: 'main' });

async function main(): Promise<void> {
  const config = loadConfig();
  rootLogger.level = config.logLevel;

  const { handler } = createServices(config);
  const app = createHttpApp({ handler, maxUploadBytes: config.media.maxUploadBytes });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, workspaceRoot: config.workspaceRoot }, 'QR service listening');
  });

  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutting down');
      server.close((error) => (error ? reject(error) : resolve()));
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    server.once('error', reject);
  });
}

main().catch((error) => {
  logger.fatal({ error }, 'QR service failed');
  process.exitCode = 1;
});

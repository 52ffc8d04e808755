import { createLogger, describeError } from '@taskhook/core-logging';

import { buildApp, SERVICE_NAME } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const logger = createLogger({ service: SERVICE_NAME }, { level: config.logLevel });

const gateway = await buildApp({ config, logger });

const server = gateway.app.listen(config.port, () => {
  logger.info(`Gateway listening on port ${config.port}`, { nodeEnv: config.nodeEnv });
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info('Shutting down', { signal });
  server.close();
  try {
    await gateway.close();
    process.exitCode = 0;
  } catch (error) {
    logger.error('Shutdown failed', describeError(error));
    process.exitCode = 1;
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

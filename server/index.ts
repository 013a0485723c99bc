import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { log } from './logger';
import { createPostStorage } from './storage';
import { getErrorMessage } from './utils/error-utils';

function main(): void {
  const config = loadConfig();
  const storage = createPostStorage({ idStrategy: config.idStrategy });

  const app = createApp({
    storage,
    bodyLimitBytes: config.bodyLimitBytes,
    logRequests: config.logRequests,
  });

  const server = app.listen(config.port, config.host, () => {
    log(`serving on ${config.host}:${config.port}`);
    console.log(
      '[SERVER] Post registry seeded (id strategy: %s, env: %s)',
      config.idStrategy,
      config.nodeEnv
    );
  });

  server.on('error', (error) => {
    console.error('[SERVER] Failed to start:', getErrorMessage(error));
    process.exitCode = 1;
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[SERVER] Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        console.error('[SERVER] Error while closing:', getErrorMessage(error));
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (error) {
  console.error('[SERVER] Startup failed:', getErrorMessage(error));
  process.exitCode = 1;
}

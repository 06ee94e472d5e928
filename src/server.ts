import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, describeError, setLogger } from './infra/logger.js';
import { createConfigStore } from './infra/store/createConfigStore.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const store = await createConfigStore(env);
const app = createApp(env, store);

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Gateway admin started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    store: env.CONFIG_STORE,
  });
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  loggerInstance.info(`${signal} received, shutting down gracefully`);

  const forceExit = setTimeout(() => {
    loggerInstance.error('Graceful shutdown timed out, forcing exit', {
      timeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    });
    process.exit(1);
  }, env.SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  server.close((serverError) => {
    if (serverError) {
      loggerInstance.error('HTTP server shutdown error', describeError(serverError));
    }
    store
      .close()
      .then(() => {
        loggerInstance.info('Server closed');
        process.exit(serverError ? 1 : 0);
      })
      .catch((error: unknown) => {
        loggerInstance.error('Failed to close config store', describeError(error));
        process.exit(1);
      });
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

export { app };

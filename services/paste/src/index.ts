import { config } from './config';
import { secondsToNanos } from './clock';
import { createRedis } from './redis/client';
import { Reaper } from './reaper/reaper';
import { buildApp } from './server';
import { RedisPasteStore } from './storage/redisPasteStore';

/**
 * Main entrypoint for the paste service.
 * Wires Redis, the store, the HTTP app and the reaper, then listens on configured host/port.
 */
async function main() {
  const redis = createRedis(config.redisUrl);
  const store = new RedisPasteStore(redis, { keyPrefix: config.redisKeyPrefix });
  const app = await buildApp({ store, logger: true, trustProxy: config.trustProxy });

  const reaper = new Reaper({
    store,
    logger: app.log,
    intervalMs: config.reaper.intervalSeconds * 1000,
    grace: secondsToNanos(config.reaper.graceSeconds),
  });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await reaper.stop();
    await app.close();
    await redis.quit();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    reaper.start();
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting paste service:', err);
  process.exit(1);
});

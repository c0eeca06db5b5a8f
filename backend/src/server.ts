import { buildApp } from './app.js';
import { config } from './config.js';
import { SqliteCache } from './db/cacheRepository.js';
import { closeDatabase, initDatabase } from './db/index.js';
import { RoleRepository } from './db/roleRepository.js';
import { loadRoleSeed, seedRoles } from './db/roleSeed.js';
import logger from './logger.js';

const CACHE_PURGE_INTERVAL_MS = 15 * 60 * 1000;

async function bootstrap() {
  const db = await initDatabase(config.databasePath);
  await seedRoles(new RoleRepository(db), await loadRoleSeed(config.roleSeedPath));

  const { app, services } = await buildApp({ config, db });

  logger.info(
    {
      algorithm: config.auth.algorithm,
      accessTokenExpireMinutes: config.auth.accessTokenExpireMinutes,
      refreshTokenExpireMinutes: config.auth.refreshTokenExpireMinutes,
      roleScopesCache: config.cache.backend,
    },
    'Token authentication configured',
  );

  // Expired rows are already invisible to reads; this only keeps the table small.
  const { cache } = services;
  const purgeTimer =
    cache instanceof SqliteCache
      ? setInterval(() => {
          const purged = cache.purgeExpired();
          if (purged > 0) {
            logger.debug({ purged }, 'Purged expired cache entries');
          }
        }, CACHE_PURGE_INTERVAL_MS)
      : null;
  purgeTimer?.unref();

  app.addHook('onClose', async () => {
    if (purgeTimer) {
      clearInterval(purgeTimer);
    }
    closeDatabase();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port }, 'storefront api listening');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  logger.error({ err: error }, 'Bootstrap failed');
  process.exit(1);
});

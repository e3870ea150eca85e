import { createApp } from './app';
import { config } from './config';
import { type KVStore, closeKVClient, getKVClient } from './kv-client';
import { KVLinkCache } from './services/cache.service';
import { LinkService } from './services/link.service';
import { RateLimiter } from './services/rate-limiter';
import { RedirectService } from './services/redirect.service';
import { KVSequenceSource, type SequenceSource, SqliteSequenceSource } from './services/sequence.service';
import { ExpirationSweeper } from './services/sweeper.service';
import { openLinkDatabase } from './store/database';
import { SqliteLinkStore } from './store/sqlite-link-store';
import { createLogger } from './utils/logger';

const logger = createLogger('server');

async function main() {
  try {
    const database = openLinkDatabase(config.database);
    const store = new SqliteLinkStore(database);
    logger.info(`Opened link database at ${config.database.path}`);

    // The KV server is optional at startup: the cache degrades to misses until it answers
    const getClient = (): Promise<KVStore> => getKVClient();
    try {
      const client = await getKVClient();
      if (await client.ping()) {
        logger.info(`Connected to KV server at ${config.kv.host}:${config.kv.port}`);
      }
    } catch (error) {
      logger.warn('KV server not reachable, serving from the database only', { error });
    }

    const cache = new KVLinkCache(getClient, { timeoutMs: config.shortener.cacheTimeoutMs });
    const sequence: SequenceSource =
      config.shortener.sequenceBackend === 'kv'
        ? new KVSequenceSource(getClient, config.shortener.sequenceKey, config.kv.commandTimeout)
        : new SqliteSequenceSource(database.writer, config.shortener.sequenceKey);

    const links = new LinkService({
      store,
      cache,
      sequence,
      baseUrl: config.baseUrl,
      cacheDefaultTtl: config.shortener.cacheDefaultTtl,
    });
    const redirects = new RedirectService({
      store,
      cache,
      cacheDefaultTtl: config.shortener.cacheDefaultTtl,
      storeTimeoutMs: config.shortener.storeTimeoutMs,
    });
    const rateLimiter = new RateLimiter(getClient, config.rateLimit);

    const sweeper = new ExpirationSweeper(store, { schedule: config.sweeper.schedule });
    if (config.sweeper.enabled) {
      sweeper.start();
    }

    const app = createApp({
      links,
      redirects,
      store,
      rateLimiter,
      checkHealth: async () => {
        const kv = await getKVClient()
          .then((client) => client.ping())
          .catch(() => false);
        const databaseOk = await store
          .countLinks(Date.now())
          .then(() => true)
          .catch(() => false);
        return { kv, database: databaseOk };
      },
    });

    const server = app.listen(config.port, () => {
      logger.info(`Short link API running at http://localhost:${config.port}`);
      logger.info(`Base URL for short links: ${config.baseUrl}`);
      logger.info(`Sequence backend: ${config.shortener.sequenceBackend}`);
    });

    // Graceful shutdown
    const shutdown = async () => {
      logger.info('Shutting down...');
      sweeper.stop();
      server.close();
      await redirects.drain();
      await closeKVClient();
      database.close();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

void main();

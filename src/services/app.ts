/**
 * Application Service
 *
 * Main application orchestration logic.
 * Wires configuration into the acquisition stack, runs the dashboard
 * session and handles graceful shutdown.
 */

import path from 'node:path';
import { cfg, type AppConfig } from '../core/config.js';
import { logger } from '../core/logger.js';
import { FileStore } from '../cache/fileStore.js';
import { createRedisStore } from '../cache/redisStore.js';
import type { PersistentStore } from '../cache/store.js';
import { NbaApiClient } from '../http/nbaApiClient.js';
import { RetryingFetcher } from '../http/retryingFetcher.js';
import { RateLimiter } from '../util/rateLimiter.js';
import { DashboardSession } from './dashboardSession.js';
import { LeagueDataService } from './leagueData.js';

function createStore(config: AppConfig): PersistentStore {
  if (config.cache.store === 'redis') {
    return createRedisStore(config.redis.url, config.cache.offlineWindowSeconds);
  }
  return new FileStore(path.resolve(config.cache.dir));
}

/**
 * Builds the data service and dashboard session for a configuration
 */
export function createDashboard(config: AppConfig, store: PersistentStore | null): {
  data: LeagueDataService;
  session: DashboardSession;
} {
  const client = new NbaApiClient({
    baseUrl: config.nbaApi.baseUrl,
    requestTimeoutMs: config.nbaApi.requestTimeoutMs
  });
  const limiter = new RateLimiter(config.rateLimit.minIntervalMs);
  const fetcher = new RetryingFetcher({
    limiter,
    options: {
      maxAttempts: config.retry.maxAttempts,
      backoffBaseMs: config.retry.baseDelayMs,
      maxBackoffMs: config.retry.maxDelayMs,
      jitterMs: config.retry.jitterMs,
      rateLimitCooldownMs: config.rateLimit.cooldownMs
    }
  });

  const data = new LeagueDataService({
    client,
    fetcher,
    store,
    ttlSeconds: config.cache.ttlSeconds,
    offlineWindowSeconds: config.cache.offlineWindowSeconds,
    logger: logger.child({ component: 'leagueData' })
  });

  const session = new DashboardSession(data, {
    refreshMode: config.refresh.mode,
    refresh: {
      fixedSeconds: config.refresh.intervalSeconds,
      liveSeconds: config.refresh.liveSeconds,
      idleSeconds: config.refresh.idleSeconds
    },
    favoriteTeam: config.dashboard.favoriteTeam,
    gameSort: config.dashboard.gameSort,
    favoritesOnly: config.dashboard.favoritesOnly,
    gameDate: config.dashboard.gameDate,
    timeZone: config.dashboard.timeZone
  });

  return { data, session };
}

/**
 * Sets up graceful shutdown handlers
 *
 * SIGINT/SIGTERM stop the refresh loop and close the persistent store.
 * SIGUSR2 is the headless refresh key.
 */
function setupSignalHandlers(controller: AbortController, session: DashboardSession, data: LeagueDataService): void {
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    controller.abort();

    try {
      await data.close();
    } catch (err) {
      logger.warn({ err }, 'Error closing cache store');
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGUSR2', () => {
    logger.info({ date: session.date }, 'manual refresh requested');
    session.refreshNow(controller.signal).catch(err => logger.warn({ err }, 'manual refresh failed'));
  });
}

/**
 * Main application logic
 *
 * 1. Opens the configured persistent tier (file or Redis)
 * 2. Builds the acquisition stack around one shared rate limiter
 * 3. Runs the dashboard session until shutdown, logging each snapshot
 */
export async function startApp(config: AppConfig = cfg): Promise<void> {
  const store = createStore(config);
  const { data, session } = createDashboard(config, store);

  logger.info(
    {
      date: session.date,
      store: config.cache.store,
      refreshMode: config.refresh.mode,
      baseUrl: config.nbaApi.baseUrl
    },
    'starting dashboard session'
  );

  session.onSnapshot(snapshot => {
    for (const [name, s] of Object.entries({ games: snapshot.games, standings: snapshot.standings, leaders: snapshot.leaders })) {
      if (!s.ok) logger.warn({ dataset: name, message: s.message }, 'dataset unavailable');
      else if (s.freshness === 'stale-usable') logger.warn({ dataset: name, fetchedAt: new Date(s.fetchedAt).toISOString() }, 'offline, showing cached data');
    }
    if (snapshot.favoriteNotice) logger.info(snapshot.favoriteNotice);
  });

  const controller = new AbortController();
  setupSignalHandlers(controller, session, data);

  await session.run(controller.signal);
}

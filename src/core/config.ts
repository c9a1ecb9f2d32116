/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import and validates
 * every variable against a zod schema.
 */

import 'dotenv/config';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { CACHE_TTL, HTTP, RATE_LIMIT, REFRESH, RETRY } from './constants.js';
import { ValidationError } from '../errors/index.js';
import { isValidDateISO, isValidTimeZone, isValidTricode, isValidUrl } from '../util/validation.js';

export type RefreshMode = 'fixed' | 'auto';
export type RefreshInterval = (typeof REFRESH.INTERVAL_CHOICES)[number];
export type GameSort = 'time' | 'favorite_first';
export type CacheStoreKind = 'file' | 'redis';

export interface AppConfig {
  nbaApi: {
    baseUrl: string;
    requestTimeoutMs: number;
  };
  cache: {
    store: CacheStoreKind;
    dir: string;
    ttlSeconds: {
      games: number;
      standings: number;
      leaders: number;
      gameDetail: number;
      team: number;
    };
    offlineWindowSeconds: number;
  };
  redis: {
    url: string;
  };
  rateLimit: {
    minIntervalMs: number;
    cooldownMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
  };
  refresh: {
    mode: RefreshMode;
    intervalSeconds: RefreshInterval;
    liveSeconds: number;
    idleSeconds: number;
  };
  dashboard: {
    favoriteTeam: string;
    gameSort: GameSort;
    favoritesOnly: boolean;
    gameDate: string;
    timeZone: string;
  };
  logLevel: string;
}

type Env = Record<string, string | undefined>;

/**
 * Platform config directory: %APPDATA% on Windows, $XDG_CONFIG_HOME or ~/.config elsewhere
 */
export function defaultConfigDir(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return path.join(env.APPDATA || os.homedir(), 'courtside');
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'courtside');
}

const positiveOrZero = z.coerce.number().int().min(0);

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off']))
  .transform(value => ['1', 'true', 'yes', 'on'].includes(value));

const envSchema = z.object({
  // Upstream
  NBA_API_BASE_URL: z.string().refine(isValidUrl, 'must be a URL').default('http://localhost:8000'), // data bridge URL
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(HTTP.REQUEST_TIMEOUT_MS),

  // Cache
  CACHE_STORE: z.enum(['file', 'redis']).default('file'),
  CACHE_DIR: z.string().optional(),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CACHE_TTL_GAMES_SECONDS: positiveOrZero.default(CACHE_TTL.GAMES_SECONDS),
  CACHE_TTL_STANDINGS_SECONDS: positiveOrZero.default(CACHE_TTL.STANDINGS_SECONDS),
  CACHE_TTL_LEADERS_SECONDS: positiveOrZero.default(CACHE_TTL.LEADERS_SECONDS),
  CACHE_TTL_GAME_DETAIL_SECONDS: positiveOrZero.default(CACHE_TTL.GAME_DETAIL_SECONDS),
  CACHE_TTL_TEAM_SECONDS: positiveOrZero.default(CACHE_TTL.TEAM_SECONDS),
  OFFLINE_WINDOW_SECONDS: positiveOrZero.default(CACHE_TTL.OFFLINE_WINDOW_SECONDS),

  // Rate limiting and retries
  RATE_LIMIT_MIN_INTERVAL_MS: positiveOrZero.default(RATE_LIMIT.MIN_INTERVAL_MS),
  RATE_LIMIT_COOLDOWN_MS: positiveOrZero.default(RATE_LIMIT.COOLDOWN_MS),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(RETRY.MAX_ATTEMPTS),
  RETRY_BASE_DELAY_MS: positiveOrZero.default(RETRY.BASE_DELAY_MS),
  RETRY_MAX_DELAY_MS: positiveOrZero.default(RETRY.MAX_DELAY_MS),
  RETRY_JITTER_MS: positiveOrZero.default(RETRY.JITTER_MS),

  // Refresh
  REFRESH_MODE: z.enum(['fixed', 'auto']).default('fixed'),
  REFRESH_INTERVAL_SECONDS: z.coerce
    .number()
    .refine(
      (value): value is RefreshInterval => REFRESH.INTERVAL_CHOICES.some(choice => choice === value),
      `must be one of ${REFRESH.INTERVAL_CHOICES.join(', ')}`
    )
    .default(REFRESH.DEFAULT_INTERVAL_SECONDS),
  AUTO_REFRESH_LIVE_SECONDS: z.coerce.number().int().min(1).default(REFRESH.AUTO_LIVE_SECONDS),
  AUTO_REFRESH_IDLE_SECONDS: z.coerce.number().int().min(1).default(REFRESH.AUTO_IDLE_SECONDS),

  // Dashboard
  FAVORITE_TEAM: z.string().trim().toUpperCase().refine(isValidTricode, 'must be a 2-5 letter tricode').default('LAL'),
  GAME_SORT: z.enum(['time', 'favorite_first']).default('time'),
  FAVORITES_ONLY: booleanFlag.default('false'),
  GAME_DATE: z.string().trim().refine(isValidDateISO, 'expected YYYY-MM-DD').optional(), // unset = today
  TIMEZONE: z.string().refine(isValidTimeZone, 'unknown time zone').default('America/New_York'),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
});

/**
 * Builds the application configuration from an environment map. Unset
 * and blank variables take their defaults.
 *
 * @throws ValidationError naming the first invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const [first] = result.error.issues;
    const field = String(first.path[0]);
    const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${details}`, field);
  }

  const e = result.data;
  return {
    nbaApi: {
      baseUrl: e.NBA_API_BASE_URL,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS
    },
    cache: {
      store: e.CACHE_STORE,
      dir: e.CACHE_DIR ?? path.join(defaultConfigDir(env), 'cache'),
      ttlSeconds: {
        games: e.CACHE_TTL_GAMES_SECONDS,
        standings: e.CACHE_TTL_STANDINGS_SECONDS,
        leaders: e.CACHE_TTL_LEADERS_SECONDS,
        gameDetail: e.CACHE_TTL_GAME_DETAIL_SECONDS,
        team: e.CACHE_TTL_TEAM_SECONDS
      },
      offlineWindowSeconds: e.OFFLINE_WINDOW_SECONDS
    },
    redis: {
      url: e.REDIS_URL
    },
    rateLimit: {
      minIntervalMs: e.RATE_LIMIT_MIN_INTERVAL_MS,
      cooldownMs: e.RATE_LIMIT_COOLDOWN_MS
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      jitterMs: e.RETRY_JITTER_MS
    },
    refresh: {
      mode: e.REFRESH_MODE,
      intervalSeconds: e.REFRESH_INTERVAL_SECONDS,
      liveSeconds: e.AUTO_REFRESH_LIVE_SECONDS,
      idleSeconds: e.AUTO_REFRESH_IDLE_SECONDS
    },
    dashboard: {
      favoriteTeam: e.FAVORITE_TEAM,
      gameSort: e.GAME_SORT,
      favoritesOnly: e.FAVORITES_ONLY,
      gameDate: e.GAME_DATE ?? '',
      timeZone: e.TIMEZONE
    },
    logLevel: e.LOG_LEVEL
  };
}

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = loadConfig();

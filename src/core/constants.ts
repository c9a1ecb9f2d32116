/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration constants.
 * Makes the code more maintainable and self-documenting.
 */

/**
 * Cache TTL values (in seconds)
 */
export const CACHE_TTL = {
  /** Scoreboard for a date: short, scores move during live games */
  GAMES_SECONDS: 90,

  /** Conference standings change at most once per game night */
  STANDINGS_SECONDS: 3600,

  /** League leaders */
  LEADERS_SECONDS: 3600,

  /** Box score of a single game */
  GAME_DETAIL_SECONDS: 300,

  /** Team profile, recent games and roster */
  TEAM_SECONDS: 3600,

  /** Cached data older than its TTL is still served when offline, up to 24 hours */
  OFFLINE_WINDOW_SECONDS: 86400,
} as const;

/**
 * Outbound request spacing (in milliseconds)
 */
export const RATE_LIMIT = {
  /** Minimum spacing between two upstream calls */
  MIN_INTERVAL_MS: 600,

  /** Extra wait added to the next window after a 429 without Retry-After */
  COOLDOWN_MS: 5000,
} as const;

/**
 * Retry schedule for transient upstream failures
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,

  /** Backoff is BASE_DELAY_MS * 2^(attempt-1), capped at MAX_DELAY_MS */
  BASE_DELAY_MS: 1000,
  MAX_DELAY_MS: 10000,

  /** Upper bound of the random jitter added to each backoff */
  JITTER_MS: 250,
} as const;

/**
 * Refresh cadence (in seconds)
 */
export const REFRESH = {
  /** Intervals offered for fixed mode; 0 = manual refresh only */
  INTERVAL_CHOICES: [10, 15, 30, 60, 120, 0] as const,

  DEFAULT_INTERVAL_SECONDS: 30,

  /** Auto mode while at least one game is live */
  AUTO_LIVE_SECONDS: 30,

  /** Auto mode when nothing is live */
  AUTO_IDLE_SECONDS: 120,

  /** Timer length while waiting for a manual refresh (interval 0) */
  MANUAL_IDLE_WAIT_SECONDS: 3600,
} as const;

/**
 * HTTP client configuration
 */
export const HTTP = {
  REQUEST_TIMEOUT_MS: 10000,
} as const;

/**
 * Favorite team notifications
 */
export const FAVORITE = {
  /** A scheduled favorite-team game within this many minutes is "starting soon" */
  STARTING_SOON_MINUTES: 60,
} as const;

/**
 * Team page limits
 */
export const TEAM_PAGE = {
  /** Players listed per stat in the team leaders block */
  LEADERS_PER_STAT: 3,

  RECENT_GAMES: 5,

  /** Upcoming games are looked up this many days past today */
  UPCOMING_DAYS: 7,
  UPCOMING_GAMES: 5,
} as const;

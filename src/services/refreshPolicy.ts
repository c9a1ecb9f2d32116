/**
 * Refresh Policy
 *
 * Decides how long the dashboard waits before reloading on its own.
 *
 * - fixed: the configured interval, whatever is on screen
 * - auto: a short interval while any game is live, a long one otherwise
 *
 * 0 means no automatic refresh; a manual refresh still works.
 */

import { REFRESH } from '../core/constants.js';
import type { RefreshMode } from '../core/config.js';
import type { GameState } from './gameClassifier.js';

export interface RefreshSettings {
  /** Interval for fixed mode; 0 disables automatic refresh */
  fixedSeconds: number;
  liveSeconds: number;
  idleSeconds: number;
}

export const DEFAULT_REFRESH_SETTINGS: RefreshSettings = {
  fixedSeconds: REFRESH.DEFAULT_INTERVAL_SECONDS,
  liveSeconds: REFRESH.AUTO_LIVE_SECONDS,
  idleSeconds: REFRESH.AUTO_IDLE_SECONDS
};

/**
 * @example
 * nextIntervalSeconds('auto', [liveGame, finalGame]) // Returns 30
 * nextIntervalSeconds('auto', [])                    // Returns 120
 * nextIntervalSeconds('fixed', [liveGame], { ...DEFAULT_REFRESH_SETTINGS, fixedSeconds: 0 }) // Returns 0
 */
export function nextIntervalSeconds(
  mode: RefreshMode,
  gameStates: readonly Pick<GameState, 'category'>[],
  settings: RefreshSettings = DEFAULT_REFRESH_SETTINGS
): number {
  if (mode === 'fixed') return Math.max(0, settings.fixedSeconds);
  const anyLive = gameStates.some(state => state.category === 'live');
  return Math.max(0, anyLive ? settings.liveSeconds : settings.idleSeconds);
}

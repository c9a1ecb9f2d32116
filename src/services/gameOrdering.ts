/**
 * Game ordering and favorite-team notices
 *
 * Arranges the day's raw games before classification, so hotkeys follow
 * the order the dashboard shows: live games first, then scheduled, then
 * final.
 */

import { FAVORITE } from '../core/constants.js';
import type { GameSort } from '../core/config.js';
import type { Game } from '../types/api.js';
import { categoryOf, type GameCategory } from './gameClassifier.js';

export interface OrderingOptions {
  sort: GameSort;
  favoriteTeam: string;
  favoritesOnly: boolean;
}

const GROUP_ORDER: readonly GameCategory[] = ['live', 'scheduled', 'final'];

export function hasTeam(game: Game, tricode: string): boolean {
  const team = tricode.toUpperCase();
  return game.homeTeam.teamTricode.toUpperCase() === team || game.awayTeam.teamTricode.toUpperCase() === team;
}

/** Start time in epoch ms; unparseable times sort last */
function startTime(game: Game): number {
  const ms = Date.parse(game.gameTimeUTC);
  return Number.isNaN(ms) ? Number.POSITIVE_INFINITY : ms;
}

export function arrangeGames(games: readonly Game[], options: OrderingOptions): Game[] {
  const favorite = options.favoriteTeam;
  const filtered = options.favoritesOnly && favorite ? games.filter(g => hasTeam(g, favorite)) : [...games];

  const compare = (a: Game, b: Game): number => {
    if (options.sort === 'favorite_first' && favorite) {
      const rank = Number(!hasTeam(a, favorite)) - Number(!hasTeam(b, favorite));
      if (rank !== 0) return rank;
    }
    const ta = startTime(a);
    const tb = startTime(b);
    return ta === tb ? 0 : ta < tb ? -1 : 1;
  };

  return GROUP_ORDER.flatMap(category => filtered.filter(g => categoryOf(g) === category).sort(compare));
}

/**
 * Short notice when the favorite team is playing now or starts within the hour
 *
 * @example
 * favoriteNotice(games, 'LAL', Date.parse('2025-02-13T23:15:00Z'))
 * // Returns: 'Your team starts in 45 min' for a 00:00Z tip-off
 */
export function favoriteNotice(games: readonly Game[], favoriteTeam: string, nowMs: number): string | null {
  if (!favoriteTeam) return null;
  const mine = games.filter(g => hasTeam(g, favoriteTeam));

  if (mine.some(g => categoryOf(g) === 'live')) return 'Your team is playing now';

  for (const game of mine) {
    if (categoryOf(game) !== 'scheduled') continue;
    const start = Date.parse(game.gameTimeUTC);
    if (Number.isNaN(start)) continue;
    const minutes = (start - nowMs) / 60_000;
    if (minutes >= 0 && minutes <= FAVORITE.STARTING_SOON_MINUTES) {
      return `Your team starts in ${Math.floor(minutes)} min`;
    }
  }
  return null;
}

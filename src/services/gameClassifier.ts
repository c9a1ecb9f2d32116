/**
 * Game Classifier
 *
 * Turns the day's raw game records into display-ready game states:
 * category, scores, a live clock label and a positional hotkey.
 *
 * The classifier keeps the input order. Sorting (by start time or
 * favorite team first) happens before classification, in gameOrdering.
 */

import type { Game } from '../types/api.js';

/**
 * Hotkey symbols in assignment order: position 0 -> '1', 8 -> '9', 9 -> '0',
 * 10 -> 'a', 19 -> 'j'
 */
export const HOTKEYS = '1234567890abcdefghij';

export type Hotkey = string;

export type GameCategory = 'scheduled' | 'live' | 'final';

/**
 * NBA.com game status codes
 */
export const GAME_STATUS = {
  SCHEDULED: 1,
  LIVE: 2,
  FINAL: 3
} as const;

export interface GameState {
  gameId: string;
  category: GameCategory;
  homeTricode: string;
  awayTricode: string;
  homeScore: number;
  awayScore: number;
  /** 'Q3 5:30', 'OT 1:02', 'Half'; empty unless live */
  clockLabel: string;
  /** null beyond the last hotkey symbol */
  hotkeyIndex: Hotkey | null;
  startTimeUTC: string;
  statusText: string;
}

/**
 * Hotkey for a 0-based position in the day's list, or null when the
 * symbols run out
 */
export function hotkeyFor(position: number): Hotkey | null {
  if (!Number.isInteger(position) || position < 0 || position >= HOTKEYS.length) return null;
  return HOTKEYS.charAt(position);
}

export function categoryOf(game: Game): GameCategory {
  if (game.gameStatus === GAME_STATUS.FINAL || game.gameStatusText.startsWith('Final')) return 'final';
  if (game.gameStatus === GAME_STATUS.LIVE) return 'live';
  if (game.gameStatus === GAME_STATUS.SCHEDULED) return 'scheduled';
  // unknown status code: a score means the game has started
  return (game.homeTeam.score ?? 0) > 0 || (game.awayTeam.score ?? 0) > 0 ? 'live' : 'scheduled';
}

/**
 * Parses a game clock into whole minutes and seconds remaining
 *
 * Accepts ISO-8601 durations ('PT05M30.00S') and 'm:ss' ('5:30').
 *
 * @returns null for an empty or unrecognized clock
 */
export function parseGameClock(clock: string): { minutes: number; seconds: number } | null {
  const value = clock.trim();
  if (!value) return null;

  const iso = /^PT(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?$/i.exec(value);
  if (iso && (iso[1] !== undefined || iso[2] !== undefined)) {
    return { minutes: Number(iso[1] ?? 0), seconds: Math.floor(Number(iso[2] ?? 0)) };
  }

  const colon = /^(\d+):(\d{1,2}(?:\.\d+)?)$/.exec(value);
  if (colon) {
    return { minutes: Number(colon[1]), seconds: Math.floor(Number(colon[2])) };
  }
  return null;
}

/**
 * 'Q1'..'Q4' for regulation, 'OT' for the first overtime, then '2OT', '3OT'...
 */
export function periodLabel(period: number): string {
  if (period <= 4) return `Q${period}`;
  const overtime = period - 4;
  return overtime === 1 ? 'OT' : `${overtime}OT`;
}

/**
 * Clock label for a live game
 *
 * Falls back to the upstream status text when period or clock is missing.
 */
export function formatLiveClock(game: Pick<Game, 'period' | 'gameClock' | 'gameStatusText'>): string {
  const status = game.gameStatusText.trim();
  if (/halftime/i.test(status)) return 'Half';

  const clock = parseGameClock(game.gameClock);
  if (game.period > 0 && clock) {
    if (game.period === 2 && clock.minutes === 0 && clock.seconds === 0) return 'Half';
    return `${periodLabel(game.period)} ${clock.minutes}:${String(clock.seconds).padStart(2, '0')}`;
  }
  return status;
}

/**
 * Classifies the day's games in input order
 */
export function classify(games: readonly Game[]): GameState[] {
  return games.map((game, position) => {
    const category = categoryOf(game);
    return {
      gameId: game.gameId,
      category,
      homeTricode: game.homeTeam.teamTricode,
      awayTricode: game.awayTeam.teamTricode,
      homeScore: game.homeTeam.score ?? 0,
      awayScore: game.awayTeam.score ?? 0,
      clockLabel: category === 'live' ? formatLiveClock(game) : '',
      hotkeyIndex: hotkeyFor(position),
      startTimeUTC: game.gameTimeUTC,
      statusText: game.gameStatusText
    };
  });
}

/**
 * Resolves a pressed key to the game it labels. Letters match case-insensitively.
 */
export function gameForHotkey(states: readonly GameState[], key: string): GameState | null {
  const symbol = key.toLowerCase();
  if (symbol.length !== 1) return null;
  return states.find(state => state.hotkeyIndex === symbol) ?? null;
}

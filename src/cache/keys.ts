/**
 * Dataset Keys
 *
 * Identifies a cacheable query. Two keys are equal iff their kind and all
 * parameters match, which is exactly when their ids match.
 */

import { isValidDateISO, isValidGameId, isValidTeamId, ValidationError } from '../util/validation.js';

export type DatasetKind = 'games' | 'standings' | 'leaders' | 'game-detail' | TeamDatasetKind;

export type TeamDatasetKind = 'team-info' | 'team-games' | 'team-roster';

export interface GamesKey {
  readonly kind: 'games';
  readonly date: string;
}

export interface StandingsKey {
  readonly kind: 'standings';
}

export interface LeadersKey {
  readonly kind: 'leaders';
}

export interface GameDetailKey {
  readonly kind: 'game-detail';
  readonly gameId: string;
}

/**
 * Team profile, season game log or roster of one team
 */
export interface TeamKey<K extends TeamDatasetKind = TeamDatasetKind> {
  readonly kind: K;
  readonly teamId: number;
}

export type DatasetKey = GamesKey | StandingsKey | LeadersKey | GameDetailKey | TeamKey;

function teamKey<K extends TeamDatasetKind>(kind: K, teamId: number): TeamKey<K> {
  if (!isValidTeamId(teamId)) {
    throw new ValidationError(`Invalid team ID: ${teamId}`, 'teamId');
  }
  return Object.freeze({ kind, teamId });
}

/**
 * Generates validated, frozen dataset keys
 */
export const KEYS = {
  /** Scoreboard for a calendar date (YYYY-MM-DD) */
  games: (date: string): GamesKey => {
    if (!isValidDateISO(date)) {
      throw new ValidationError(`Invalid date format: ${date}. Expected YYYY-MM-DD`, 'date');
    }
    return Object.freeze({ kind: 'games', date });
  },

  /** Current conference standings */
  standings: (): StandingsKey => Object.freeze({ kind: 'standings' }),

  /** Current league leaders */
  leaders: (): LeadersKey => Object.freeze({ kind: 'leaders' }),

  /** Box score of one game */
  gameDetail: (gameId: string): GameDetailKey => {
    if (!isValidGameId(gameId)) {
      throw new ValidationError(`Invalid game ID format: ${gameId}`, 'gameId');
    }
    return Object.freeze({ kind: 'game-detail', gameId });
  },

  teamInfo: (teamId: number): TeamKey<'team-info'> => teamKey('team-info', teamId),

  /** Completed games of the current season */
  teamGames: (teamId: number): TeamKey<'team-games'> => teamKey('team-games', teamId),

  teamRoster: (teamId: number): TeamKey<'team-roster'> => teamKey('team-roster', teamId)
};

/**
 * Canonical string form of a key, used for both cache tiers
 *
 * @example
 * keyId(KEYS.games('2025-02-13')) // 'games:2025-02-13'
 */
export function keyId(key: DatasetKey): string {
  switch (key.kind) {
    case 'games':
      return `games:${key.date}`;
    case 'standings':
      return 'standings';
    case 'leaders':
      return 'leaders';
    case 'game-detail':
      return `game-detail:${key.gameId}`;
    default:
      return `${key.kind}:${key.teamId}`;
  }
}

export function sameKey(a: DatasetKey, b: DatasetKey): boolean {
  return keyId(a) === keyId(b);
}

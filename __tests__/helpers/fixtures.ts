import type { BoxScore, Game, LeagueLeaders, Scoreboard, Standings, TeamInfo } from '../../src/types/api.js';

export interface GameOptions {
  status?: number;
  statusText?: string;
  home?: string;
  away?: string;
  homeScore?: number | null;
  awayScore?: number | null;
  period?: number;
  clock?: string;
  time?: string;
}

/** Game ids are '00224000NN' */
export function gameId(n: number): string {
  return `00224000${String(n).padStart(2, '0')}`;
}

export function makeGame(n: number, options: GameOptions = {}): Game {
  return {
    gameId: gameId(n),
    gameStatus: options.status ?? 1,
    gameStatusText: options.statusText ?? '7:30 pm ET',
    period: options.period ?? 0,
    gameClock: options.clock ?? '',
    gameTimeUTC: options.time ?? '2025-02-14T00:30:00Z',
    homeTeam: {
      teamId: 1000 + n,
      teamName: 'Home',
      teamCity: 'Home City',
      teamTricode: options.home ?? `H${String.fromCharCode(65 + (n % 26))}`,
      score: options.homeScore === undefined ? 0 : options.homeScore,
      periods: []
    },
    awayTeam: {
      teamId: 2000 + n,
      teamName: 'Away',
      teamCity: 'Away City',
      teamTricode: options.away ?? `A${String.fromCharCode(65 + (n % 26))}`,
      score: options.awayScore === undefined ? 0 : options.awayScore,
      periods: []
    }
  };
}

export function makeScoreboard(games: Game[], gameDate = '2025-02-13'): Scoreboard {
  return { gameDate, games };
}

export const STANDINGS: Standings = {
  season: '2024-25',
  teams: [
    {
      teamId: 1,
      teamCity: 'East City',
      teamName: 'Testers',
      teamTricode: 'EAS',
      conference: 'East',
      playoffRank: 1,
      wins: 40,
      losses: 12,
      winPct: 0.769
    }
  ]
};

export const LEADERS: LeagueLeaders = {
  PTS: [{ player: 'Player One', team: 'AAA', value: 31.2 }],
  REB: [],
  AST: [],
  TDBL: []
};

export function makeBoxScore(n: number): BoxScore {
  const game = makeGame(n, { status: 3, statusText: 'Final', homeScore: 110, awayScore: 102 });
  return {
    ...game,
    homeTeam: {
      ...game.homeTeam,
      periods: [
        { period: 1, score: 30 },
        { period: 2, score: 25 },
        { period: 3, score: 28 },
        { period: 4, score: 27 }
      ],
      players: []
    },
    awayTeam: {
      ...game.awayTeam,
      periods: [
        { period: 1, score: 24 },
        { period: 2, score: 26 },
        { period: 3, score: 22 },
        { period: 4, score: 30 }
      ],
      players: []
    }
  };
}

export function makeTeamInfo(teamId: number): TeamInfo {
  return {
    teamId,
    teamCity: 'East City',
    teamName: 'Testers',
    teamTricode: 'EAS',
    conference: 'East',
    division: 'Atlantic',
    season: '2024-25',
    wins: 40,
    losses: 12,
    winPct: 0.769,
    conferenceRank: 1,
    divisionRank: 1
  };
}

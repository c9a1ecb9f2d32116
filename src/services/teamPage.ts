/**
 * Team Page
 *
 * Profile, leaders, recent and upcoming games and roster of one team.
 * Every part loads through the cache and fails on its own, as the
 * dashboard sections do.
 */

import { TEAM_PAGE } from '../core/constants.js';
import { throwIfCancelled, userFacingMessage } from '../errors/index.js';
import type { CacheResult } from '../cache/tieredCache.js';
import type {
  Game,
  Leader,
  LeagueLeaders,
  RosterPlayer,
  Scoreboard,
  Standings,
  TeamGame,
  TeamInfo
} from '../types/api.js';
import { addDays } from '../util/dates.js';
import { hasTeam } from './gameOrdering.js';
import type { LeagueDataService } from './leagueData.js';
import { toSection, type Section } from './section.js';

export type TeamLeaderStat = 'PTS' | 'REB' | 'AST';
export type TeamLeaders = Record<TeamLeaderStat, Leader[]>;

export interface TeamRef {
  teamId: number;
  tricode: string;
  city: string;
  name: string;
}

export interface UpcomingGame {
  /** Scoreboard date the game is listed under */
  date: string;
  game: Game;
}

export interface TeamPage {
  team: TeamRef;
  info: Section<TeamInfo>;
  leaders: Section<TeamLeaders>;
  recentGames: Section<TeamGame[]>;
  upcomingGames: Section<UpcomingGame[]>;
  roster: Section<RosterPlayer[]>;
}

/**
 * Resolves a tricode to its team through the standings
 */
export function findTeam(standings: Standings, tricode: string): TeamRef | null {
  const wanted = tricode.toUpperCase();
  const row = standings.teams.find(t => t.teamTricode.toUpperCase() === wanted);
  if (!row) return null;
  return { teamId: row.teamId, tricode: wanted, city: row.teamCity, name: row.teamName };
}

/**
 * The team's players among the league leaders, best first
 */
export function teamLeaders(
  leaders: LeagueLeaders,
  tricode: string,
  limit: number = TEAM_PAGE.LEADERS_PER_STAT
): TeamLeaders {
  const wanted = tricode.toUpperCase();
  const top = (rows: Leader[]) => rows.filter(row => row.team.toUpperCase() === wanted).slice(0, limit);
  return { PTS: top(leaders.PTS), REB: top(leaders.REB), AST: top(leaders.AST) };
}

export function upcomingGames(
  days: ReadonlyArray<{ date: string; scoreboard: Scoreboard }>,
  tricode: string,
  limit: number = TEAM_PAGE.UPCOMING_GAMES
): UpcomingGame[] {
  return days
    .flatMap(({ date, scoreboard }) => scoreboard.games.filter(g => hasTeam(g, tricode)).map(game => ({ date, game })))
    .slice(0, limit);
}

/**
 * Scoreboards of the days after `today`. Days that fail to load are
 * skipped; the section fails only when none loaded.
 */
async function loadUpcoming(
  data: LeagueDataService,
  tricode: string,
  today: string,
  signal?: AbortSignal
): Promise<Section<UpcomingGame[]>> {
  const dates = Array.from({ length: TEAM_PAGE.UPCOMING_DAYS }, (_, i) => addDays(today, i + 1));
  const results = await Promise.allSettled(dates.map(date => data.games(date, signal)));
  throwIfCancelled(signal, 'team page load');

  const loaded: Array<{ date: string; result: CacheResult<Scoreboard> }> = [];
  const failures: unknown[] = [];
  results.forEach((result, i) => {
    if (result.status === 'fulfilled') loaded.push({ date: dates[i], result: result.value });
    else failures.push(result.reason);
  });

  if (loaded.length === 0) {
    return { ok: false, message: userFacingMessage(failures[0], 'Upcoming games') };
  }
  return {
    ok: true,
    data: upcomingGames(loaded.map(d => ({ date: d.date, scoreboard: d.result.payload })), tricode),
    freshness: loaded.some(d => d.result.freshness === 'stale-usable') ? 'stale-usable' : 'fresh',
    fetchedAt: Math.min(...loaded.map(d => d.result.fetchedAt))
  };
}

/**
 * @throws CancelledError when the signal fires before the page loads
 */
export async function loadTeamPage(
  data: LeagueDataService,
  team: TeamRef,
  today: string,
  signal?: AbortSignal
): Promise<TeamPage> {
  const [[info, leaders, log, roster], upcoming] = await Promise.all([
    Promise.allSettled([
      data.teamInfo(team.teamId, signal),
      data.leaders(signal),
      data.teamGames(team.teamId, signal),
      data.teamRoster(team.teamId, signal)
    ]),
    loadUpcoming(data, team.tricode, today, signal)
  ]);
  throwIfCancelled(signal, 'team page load');

  return {
    team,
    info: toSection(info, 'Team', i => i),
    leaders: toSection(leaders, 'Leaders', l => teamLeaders(l, team.tricode)),
    recentGames: toSection(log, 'Recent games', l => l.games.slice(0, TEAM_PAGE.RECENT_GAMES)),
    upcomingGames: upcoming,
    roster: toSection(roster, 'Roster', r => r.players)
  };
}

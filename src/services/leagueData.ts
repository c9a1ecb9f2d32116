/**
 * League Data Service
 *
 * One TieredCache per dataset kind. All of them share the upstream client,
 * the retrying fetcher (and so the rate limiter), the persistent store and
 * the offline window, so every dataset follows the same freshness policy.
 */

import { systemClock, type Clock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import {
  KEYS,
  type GameDetailKey,
  type GamesKey,
  type LeadersKey,
  type StandingsKey,
  type TeamKey
} from '../cache/keys.js';
import type { PersistentStore } from '../cache/store.js';
import { TieredCache, type CacheResult } from '../cache/tieredCache.js';
import type { RetryingFetcher } from '../http/retryingFetcher.js';
import type { UpstreamClient } from '../http/nbaApiClient.js';
import {
  boxScoreSchema,
  leagueLeadersSchema,
  scoreboardSchema,
  standingsSchema,
  teamGameLogSchema,
  teamInfoSchema,
  teamRosterSchema,
  type BoxScore,
  type LeagueLeaders,
  type Scoreboard,
  type Standings,
  type TeamGameLog,
  type TeamInfo,
  type TeamRoster
} from '../types/api.js';

export interface DatasetTtls {
  games: number;
  standings: number;
  leaders: number;
  gameDetail: number;
  /** Team profile, game log and roster */
  team: number;
}

export interface LeagueDataDeps {
  client: UpstreamClient;
  fetcher: RetryingFetcher;
  store: PersistentStore | null;
  ttlSeconds: DatasetTtls;
  offlineWindowSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

export class LeagueDataService {
  private readonly gamesCache: TieredCache<GamesKey, Scoreboard>;
  private readonly standingsCache: TieredCache<StandingsKey, Standings>;
  private readonly leadersCache: TieredCache<LeadersKey, LeagueLeaders>;
  private readonly detailCache: TieredCache<GameDetailKey, BoxScore>;
  private readonly teamInfoCache: TieredCache<TeamKey<'team-info'>, TeamInfo>;
  private readonly teamGamesCache: TieredCache<TeamKey<'team-games'>, TeamGameLog>;
  private readonly rosterCache: TieredCache<TeamKey<'team-roster'>, TeamRoster>;

  constructor(private readonly deps: LeagueDataDeps) {
    const { client, fetcher, store, ttlSeconds, offlineWindowSeconds, logger } = deps;
    const clock = deps.clock ?? systemClock;
    const shared = { fetcher, store, offlineWindowSeconds, clock };
    const childLogger = (dataset: string) => logger?.child({ dataset });

    this.gamesCache = new TieredCache<GamesKey, Scoreboard>({
      ...shared,
      name: 'games',
      ttlSeconds: ttlSeconds.games,
      load: (key, signal) => client.fetchGames(key.date, signal),
      decode: raw => scoreboardSchema.parse(raw),
      logger: childLogger('games')
    });
    this.standingsCache = new TieredCache<StandingsKey, Standings>({
      ...shared,
      name: 'standings',
      ttlSeconds: ttlSeconds.standings,
      load: (_key, signal) => client.fetchStandings(signal),
      decode: raw => standingsSchema.parse(raw),
      logger: childLogger('standings')
    });
    this.leadersCache = new TieredCache<LeadersKey, LeagueLeaders>({
      ...shared,
      name: 'leaders',
      ttlSeconds: ttlSeconds.leaders,
      load: (_key, signal) => client.fetchLeaders(signal),
      decode: raw => leagueLeadersSchema.parse(raw),
      logger: childLogger('leaders')
    });
    this.detailCache = new TieredCache<GameDetailKey, BoxScore>({
      ...shared,
      name: 'game-detail',
      ttlSeconds: ttlSeconds.gameDetail,
      load: (key, signal) => client.fetchGameDetail(key.gameId, signal),
      decode: raw => boxScoreSchema.parse(raw),
      logger: childLogger('game-detail')
    });
    this.teamInfoCache = new TieredCache<TeamKey<'team-info'>, TeamInfo>({
      ...shared,
      name: 'team-info',
      ttlSeconds: ttlSeconds.team,
      load: (key, signal) => client.fetchTeamInfo(key.teamId, signal),
      decode: raw => teamInfoSchema.parse(raw),
      logger: childLogger('team-info')
    });
    this.teamGamesCache = new TieredCache<TeamKey<'team-games'>, TeamGameLog>({
      ...shared,
      name: 'team-games',
      ttlSeconds: ttlSeconds.team,
      load: (key, signal) => client.fetchTeamGames(key.teamId, signal),
      decode: raw => teamGameLogSchema.parse(raw),
      logger: childLogger('team-games')
    });
    this.rosterCache = new TieredCache<TeamKey<'team-roster'>, TeamRoster>({
      ...shared,
      name: 'team-roster',
      ttlSeconds: ttlSeconds.team,
      load: (key, signal) => client.fetchTeamRoster(key.teamId, signal),
      decode: raw => teamRosterSchema.parse(raw),
      logger: childLogger('team-roster')
    });
  }

  /** Scoreboard for a date (YYYY-MM-DD) */
  games(date: string, signal?: AbortSignal): Promise<CacheResult<Scoreboard>> {
    return this.gamesCache.get(KEYS.games(date), this.deps.ttlSeconds.games, signal);
  }

  standings(signal?: AbortSignal): Promise<CacheResult<Standings>> {
    return this.standingsCache.get(KEYS.standings(), this.deps.ttlSeconds.standings, signal);
  }

  leaders(signal?: AbortSignal): Promise<CacheResult<LeagueLeaders>> {
    return this.leadersCache.get(KEYS.leaders(), this.deps.ttlSeconds.leaders, signal);
  }

  gameDetail(gameId: string, signal?: AbortSignal): Promise<CacheResult<BoxScore>> {
    return this.detailCache.get(KEYS.gameDetail(gameId), this.deps.ttlSeconds.gameDetail, signal);
  }

  teamInfo(teamId: number, signal?: AbortSignal): Promise<CacheResult<TeamInfo>> {
    return this.teamInfoCache.get(KEYS.teamInfo(teamId), this.deps.ttlSeconds.team, signal);
  }

  /** Completed games of the current season, most recent first */
  teamGames(teamId: number, signal?: AbortSignal): Promise<CacheResult<TeamGameLog>> {
    return this.teamGamesCache.get(KEYS.teamGames(teamId), this.deps.ttlSeconds.team, signal);
  }

  teamRoster(teamId: number, signal?: AbortSignal): Promise<CacheResult<TeamRoster>> {
    return this.rosterCache.get(KEYS.teamRoster(teamId), this.deps.ttlSeconds.team, signal);
  }

  /**
   * Marks everything the dashboard shows for a date as due, so the next
   * reads go upstream. Cached copies remain available as fallbacks.
   */
  refreshDay(date: string): void {
    this.gamesCache.invalidate(KEYS.games(date));
    this.standingsCache.invalidate(KEYS.standings());
    this.leadersCache.invalidate(KEYS.leaders());
  }

  /** Marks one game's box score as due */
  refreshGame(gameId: string): void {
    this.detailCache.invalidate(KEYS.gameDetail(gameId));
  }

  /** Marks a team's profile, game log and roster as due */
  refreshTeam(teamId: number): void {
    this.teamInfoCache.invalidate(KEYS.teamInfo(teamId));
    this.teamGamesCache.invalidate(KEYS.teamGames(teamId));
    this.rosterCache.invalidate(KEYS.teamRoster(teamId));
  }

  async close(): Promise<void> {
    await this.deps.store?.close();
  }
}

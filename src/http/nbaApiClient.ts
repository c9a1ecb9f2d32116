/**
 * NBA API Client Module
 *
 * Talks to the NBA data bridge service. Builds endpoint URLs, maps HTTP
 * status codes onto the transient / non-transient error taxonomy and
 * decodes every body against its schema.
 */

import { z } from 'zod';
import { httpGet, type HttpGet } from '../util/http.js';
import { isValidDateISO, isValidGameId, isValidTeamId, isValidUrl, ValidationError } from '../util/validation.js';
import { NonTransientUpstreamError, RateLimitedError, TransientUpstreamError } from '../errors/index.js';
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

/**
 * The upstream operations the cache delegates to
 */
export interface UpstreamClient {
  fetchGames(dateISO: string, signal?: AbortSignal): Promise<Scoreboard>;
  fetchStandings(signal?: AbortSignal): Promise<Standings>;
  fetchLeaders(signal?: AbortSignal): Promise<LeagueLeaders>;
  fetchGameDetail(gameId: string, signal?: AbortSignal): Promise<BoxScore>;
  fetchTeamInfo(teamId: number, signal?: AbortSignal): Promise<TeamInfo>;
  fetchTeamGames(teamId: number, signal?: AbortSignal): Promise<TeamGameLog>;
  fetchTeamRoster(teamId: number, signal?: AbortSignal): Promise<TeamRoster>;
}

/**
 * Constructs URL for fetching the scoreboard of a date
 *
 * Endpoint: /scoreboard/{year}/{month}/{day}
 *
 * @example
 * scoreboardUrl('http://localhost:8000', '2025-01-15')
 * // Returns: http://localhost:8000/scoreboard/2025/01/15
 */
export function scoreboardUrl(baseUrl: string, dateISO: string): string {
  if (!isValidDateISO(dateISO)) {
    throw new ValidationError(`Invalid date format: ${dateISO}`, 'dateISO');
  }
  const [y, m, d] = dateISO.split('-');
  return `${baseUrl}/scoreboard/${y}/${m}/${d}`;
}

/**
 * Endpoint: /standings
 */
export function standingsUrl(baseUrl: string): string {
  return `${baseUrl}/standings`;
}

/**
 * Endpoint: /leaders (top scorers, rebounders, assist leaders, triple-doubles)
 */
export function leadersUrl(baseUrl: string): string {
  return `${baseUrl}/leaders`;
}

/**
 * Constructs URL for fetching a game's box score
 *
 * Endpoint: /games/{gameId}/boxscore
 *
 * @example
 * boxScoreUrl('http://localhost:8000', '0022400123')
 * // Returns: http://localhost:8000/games/0022400123/boxscore
 */
export function boxScoreUrl(baseUrl: string, gameId: string): string {
  if (!isValidGameId(gameId)) {
    throw new ValidationError(`Invalid game ID format: ${gameId}`, 'gameId');
  }
  return `${baseUrl}/games/${gameId}/boxscore`;
}

/**
 * Constructs URL for a team resource
 *
 * Endpoints: /teams/{teamId}, /teams/{teamId}/games, /teams/{teamId}/roster
 *
 * @example
 * teamUrl('http://localhost:8000', 1610612747, 'roster')
 * // Returns: http://localhost:8000/teams/1610612747/roster
 */
export function teamUrl(baseUrl: string, teamId: number, resource?: 'games' | 'roster'): string {
  if (!isValidTeamId(teamId)) {
    throw new ValidationError(`Invalid team ID: ${teamId}`, 'teamId');
  }
  const url = `${baseUrl}/teams/${teamId}`;
  return resource ? `${url}/${resource}` : url;
}

export interface NbaApiClientOptions {
  baseUrl: string;
  requestTimeoutMs: number;
  /** HTTP transport, replaceable in tests */
  get?: HttpGet;
}

export class NbaApiClient implements UpstreamClient {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly get: HttpGet;

  constructor(options: NbaApiClientOptions) {
    if (!isValidUrl(options.baseUrl)) {
      throw new ValidationError(`Invalid bridge URL: ${options.baseUrl}`, 'baseUrl');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.get = options.get ?? httpGet;
  }

  fetchGames(dateISO: string, signal?: AbortSignal): Promise<Scoreboard> {
    return this.request(scoreboardUrl(this.baseUrl, dateISO), scoreboardSchema, signal);
  }

  fetchStandings(signal?: AbortSignal): Promise<Standings> {
    return this.request(standingsUrl(this.baseUrl), standingsSchema, signal);
  }

  fetchLeaders(signal?: AbortSignal): Promise<LeagueLeaders> {
    return this.request(leadersUrl(this.baseUrl), leagueLeadersSchema, signal);
  }

  fetchGameDetail(gameId: string, signal?: AbortSignal): Promise<BoxScore> {
    return this.request(boxScoreUrl(this.baseUrl, gameId), boxScoreSchema, signal);
  }

  fetchTeamInfo(teamId: number, signal?: AbortSignal): Promise<TeamInfo> {
    return this.request(teamUrl(this.baseUrl, teamId), teamInfoSchema, signal);
  }

  fetchTeamGames(teamId: number, signal?: AbortSignal): Promise<TeamGameLog> {
    return this.request(teamUrl(this.baseUrl, teamId, 'games'), teamGameLogSchema, signal);
  }

  fetchTeamRoster(teamId: number, signal?: AbortSignal): Promise<TeamRoster> {
    return this.request(teamUrl(this.baseUrl, teamId, 'roster'), teamRosterSchema, signal);
  }

  /**
   * GETs a URL and decodes the body
   *
   * - 200: decoded payload, or NonTransientUpstreamError when the body does not match
   * - 429: RateLimitedError (carries Retry-After)
   * - 408, 5xx: TransientUpstreamError
   * - anything else: NonTransientUpstreamError
   */
  private async request<S extends z.ZodTypeAny>(url: string, schema: S, signal?: AbortSignal): Promise<z.output<S>> {
    const res = await this.get(url, { timeoutMs: this.requestTimeoutMs, signal });

    if (res.status === 429) {
      throw new RateLimitedError(`Rate limited by upstream: ${url}`, url, res.retryAfterMs);
    }
    if (res.status === 408 || res.status >= 500) {
      throw new TransientUpstreamError(`Upstream returned ${res.status}: ${url}`, url, res.status);
    }
    if (res.status !== 200) {
      throw new NonTransientUpstreamError(`Upstream returned ${res.status}: ${url}`, url, res.status);
    }

    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      throw new NonTransientUpstreamError(`Malformed response from ${url}`, url, res.status, parsed.error);
    }
    return parsed.data;
  }
}

/**
 * Dashboard Session
 *
 * Headless controller behind the dashboard. Holds the date on screen,
 * loads the games, standings and leaders through the cache and reloads on
 * the schedule the RefreshPolicy picks.
 *
 * Each dataset succeeds or fails on its own: a standings outage leaves the
 * games section intact, and the failed section carries a short message
 * for the status line instead.
 */

import { systemClock, type Clock } from '../core/clock.js';
import { REFRESH } from '../core/constants.js';
import { componentLogger, type Logger } from '../core/logger.js';
import type { GameSort, RefreshMode } from '../core/config.js';
import { CancelledError, throwIfCancelled } from '../errors/index.js';
import type { ServedFreshness } from '../cache/freshness.js';
import type { BoxScore, Game, LeagueLeaders, Standings } from '../types/api.js';
import { addDays, clampToToday, todayISO } from '../util/dates.js';
import { gamesFingerprint } from '../util/hash.js';
import { isValidDateISO, ValidationError } from '../util/validation.js';
import { buildQuarterScores, tripleDoublePlayers, type QuarterScores } from './boxScore.js';
import { classify, gameForHotkey, type GameState } from './gameClassifier.js';
import { arrangeGames, favoriteNotice } from './gameOrdering.js';
import type { LeagueDataService } from './leagueData.js';
import { nextIntervalSeconds, type RefreshSettings } from './refreshPolicy.js';
import { toSection, type Section } from './section.js';
import { findTeam, loadTeamPage, type TeamPage } from './teamPage.js';

export type { Section };

export interface DashboardSnapshot {
  date: string;
  /** Classified games in display order */
  games: Section<GameState[]>;
  standings: Section<Standings>;
  leaders: Section<LeagueLeaders>;
  favoriteNotice: string | null;
  /** Seconds until the next automatic reload; 0 = manual only */
  nextRefreshSeconds: number;
  /** False when the game list renders exactly as in the previous snapshot */
  changed: boolean;
  loadedAt: number;
}

export interface GameView {
  game: GameState;
  detail: BoxScore;
  freshness: ServedFreshness;
  quarterScores: QuarterScores | null;
  /** Players with a triple-double, per side */
  tripleDoubles: { away: string[]; home: string[] };
}

export interface OpenOptions {
  /** Skip the fresh cached copy and go upstream */
  refresh?: boolean;
  signal?: AbortSignal;
}

export interface SessionSettings {
  refreshMode: RefreshMode;
  refresh: RefreshSettings;
  favoriteTeam: string;
  gameSort: GameSort;
  favoritesOnly: boolean;
  /** Initial date; empty for today */
  gameDate: string;
  timeZone: string;
}

export type SnapshotListener = (snapshot: DashboardSnapshot) => void;

interface PendingReload {
  resolve: (snapshot: DashboardSnapshot) => void;
  reject: (err: Error) => void;
}

export class DashboardSession {
  private currentDate: string;
  private favoritesOnly: boolean;
  private lastFingerprint: string | null = null;
  private last: DashboardSnapshot | null = null;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  /** Set while run() waits between reloads; calling it ends the wait early */
  private wake: (() => void) | null = null;
  private pending: PendingReload[] = [];

  constructor(
    private readonly data: LeagueDataService,
    private readonly settings: SessionSettings,
    deps: { clock?: Clock; logger?: Logger } = {}
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? componentLogger('dashboardSession');
    this.favoritesOnly = settings.favoritesOnly;

    const today = this.todayISO();
    if (settings.gameDate && !isValidDateISO(settings.gameDate)) {
      throw new ValidationError(`Invalid configured date: ${settings.gameDate}`, 'gameDate');
    }
    this.currentDate = settings.gameDate ? clampToToday(settings.gameDate, today) : today;
  }

  get date(): string {
    return this.currentDate;
  }

  get snapshot(): DashboardSnapshot | null {
    return this.last;
  }

  /**
   * Registers a listener for every snapshot; returns the unsubscribe function
   */
  onSnapshot(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  previousDay(signal?: AbortSignal): Promise<DashboardSnapshot> {
    return this.goTo(addDays(this.currentDate, -1), signal);
  }

  nextDay(signal?: AbortSignal): Promise<DashboardSnapshot> {
    return this.goTo(addDays(this.currentDate, 1), signal);
  }

  today(signal?: AbortSignal): Promise<DashboardSnapshot> {
    return this.goTo(this.todayISO(), signal);
  }

  goTo(date: string, signal?: AbortSignal): Promise<DashboardSnapshot> {
    if (!isValidDateISO(date)) {
      throw new ValidationError(`Invalid date format: ${date}. Expected YYYY-MM-DD`, 'date');
    }
    this.currentDate = date;
    return this.reload(signal);
  }

  /**
   * Shows only the favorite team's games, or everything again
   */
  toggleFavoritesOnly(signal?: AbortSignal): Promise<DashboardSnapshot> {
    this.favoritesOnly = !this.favoritesOnly;
    return this.reload(signal);
  }

  /**
   * User-triggered refresh: the date's games, standings and leaders skip
   * the fresh fast path on the next load
   */
  refreshNow(signal?: AbortSignal): Promise<DashboardSnapshot> {
    this.data.refreshDay(this.currentDate);
    return this.reload(signal);
  }

  /**
   * Loads all three sections for the current date and publishes the snapshot
   *
   * @throws CancelledError when the signal fires before the load completes
   */
  async load(signal?: AbortSignal): Promise<DashboardSnapshot> {
    const date = this.currentDate;
    const [games, standings, leaders] = await Promise.allSettled([
      this.data.games(date, signal),
      this.data.standings(signal),
      this.data.leaders(signal)
    ]);
    throwIfCancelled(signal, 'dashboard load');

    let arranged: Game[] = [];
    const gamesSection = toSection(games, 'Games', scoreboard => {
      arranged = arrangeGames(scoreboard.games, {
        sort: this.settings.gameSort,
        favoriteTeam: this.settings.favoriteTeam,
        favoritesOnly: this.favoritesOnly
      });
      return classify(arranged);
    });
    const states = gamesSection.ok ? gamesSection.data : [];

    const fingerprint = gamesFingerprint(states);
    const changed = fingerprint !== this.lastFingerprint;
    this.lastFingerprint = fingerprint;

    const snapshot: DashboardSnapshot = {
      date,
      games: gamesSection,
      standings: toSection(standings, 'Standings', s => s),
      leaders: toSection(leaders, 'Leaders', l => l),
      favoriteNotice: favoriteNotice(arranged, this.settings.favoriteTeam, this.clock.now()),
      nextRefreshSeconds: nextIntervalSeconds(this.settings.refreshMode, states, this.settings.refresh),
      changed,
      loadedAt: this.clock.now()
    };
    this.publish(snapshot);
    return snapshot;
  }

  /**
   * Box score for the game under a hotkey in the last snapshot
   *
   * @returns null when no game carries the key
   * @throws UpstreamUnavailableError when the box score cannot be loaded
   */
  async openGame(hotkey: string, options: OpenOptions = {}): Promise<GameView | null> {
    const states = this.last?.games.ok ? this.last.games.data : [];
    const game = gameForHotkey(states, hotkey);
    if (!game) return null;

    if (options.refresh) this.data.refreshGame(game.gameId);
    const result = await this.data.gameDetail(game.gameId, options.signal);
    const { awayTeam, homeTeam } = result.payload;
    return {
      game,
      detail: result.payload,
      freshness: result.freshness,
      quarterScores: buildQuarterScores(awayTeam, homeTeam),
      tripleDoubles: { away: tripleDoublePlayers(awayTeam), home: tripleDoublePlayers(homeTeam) }
    };
  }

  /**
   * Team page for a tricode, resolved through the standings
   *
   * @returns null when no team in the standings has the tricode
   * @throws UpstreamUnavailableError when the standings cannot be loaded
   */
  async openTeam(tricode: string, options: OpenOptions = {}): Promise<TeamPage | null> {
    const standings = await this.data.standings(options.signal);
    const team = findTeam(standings.payload, tricode);
    if (!team) return null;

    if (options.refresh) this.data.refreshTeam(team.teamId);
    return loadTeamPage(this.data, team, this.todayISO(), options.signal);
  }

  /**
   * Loads, then reloads on the RefreshPolicy schedule until the signal
   * fires. With an interval of 0 the loop waits for a manual refresh or a
   * date change.
   */
  async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const snapshot = await this.load(signal);
        this.settlePending(snapshot);
        await this.waitForNextReload(snapshot.nextRefreshSeconds, signal);
      }
    } catch (err) {
      if (!(err instanceof CancelledError)) throw err;
    } finally {
      this.wake = null;
      const waiting = this.pending;
      this.pending = [];
      waiting.forEach(p => p.reject(new CancelledError('dashboard reload')));
    }
  }

  private async waitForNextReload(seconds: number, signal: AbortSignal): Promise<void> {
    const wait = new AbortController();
    const stop = () => wait.abort();
    signal.addEventListener('abort', stop, { once: true });
    this.wake = stop;
    const pause = (ms: number) =>
      this.clock.sleep(ms, wait.signal).catch(err => {
        if (!(err instanceof CancelledError)) throw err;
      });
    try {
      if (seconds > 0) {
        this.logger.debug({ seconds, date: this.currentDate }, 'next reload scheduled');
        await pause(seconds * 1000);
      } else {
        this.logger.debug({ date: this.currentDate }, 'automatic refresh off, waiting for manual refresh');
        // the pending timer is what keeps the process alive until a refresh or shutdown
        while (!wait.signal.aborted) await pause(REFRESH.MANUAL_IDLE_WAIT_SECONDS * 1000);
      }
    } finally {
      this.wake = null;
      signal.removeEventListener('abort', stop);
    }
  }

  /**
   * Reloads now. While run() is active the loop does the reload and the
   * next schedule restarts from it.
   */
  private reload(signal?: AbortSignal): Promise<DashboardSnapshot> {
    const wake = this.wake;
    if (!wake) return this.load(signal);
    return new Promise<DashboardSnapshot>((resolve, reject) => {
      this.pending.push({ resolve, reject });
      wake();
    });
  }

  private settlePending(snapshot: DashboardSnapshot): void {
    const waiting = this.pending;
    this.pending = [];
    waiting.forEach(p => p.resolve(snapshot));
  }

  private publish(snapshot: DashboardSnapshot): void {
    this.last = snapshot;
    const failed = [snapshot.games, snapshot.standings, snapshot.leaders].filter(s => !s.ok).length;
    const summary = {
      date: snapshot.date,
      games: snapshot.games.ok ? snapshot.games.data.length : null,
      failed,
      nextRefreshSeconds: snapshot.nextRefreshSeconds
    };
    if (snapshot.changed) {
      this.logger.info(summary, 'dashboard updated');
    } else {
      this.logger.debug(summary, 'dashboard unchanged');
    }
    for (const listener of this.listeners) listener(snapshot);
  }

  private todayISO(): string {
    return todayISO(this.settings.timeZone, new Date(this.clock.now()));
  }
}

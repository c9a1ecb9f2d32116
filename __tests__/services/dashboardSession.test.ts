import { describe, it, expect, vi } from 'vitest';
import { DashboardSession, type DashboardSnapshot, type SessionSettings } from '../../src/services/dashboardSession.js';
import { LeagueDataService } from '../../src/services/leagueData.js';
import { DEFAULT_REFRESH_SETTINGS } from '../../src/services/refreshPolicy.js';
import { RetryingFetcher } from '../../src/http/retryingFetcher.js';
import { RateLimiter } from '../../src/util/rateLimiter.js';
import type { Clock } from '../../src/core/clock.js';
import { CancelledError, UpstreamUnavailableError, ValidationError } from '../../src/errors/index.js';
import { FakeClock, ManualClock, flush } from '../helpers/fakeClock.js';
import { MemoryStore } from '../helpers/memoryStore.js';
import { FakeUpstream } from '../helpers/fakeUpstream.js';
import { LEADERS, STANDINGS, gameId, makeBoxScore, makeGame, makeScoreboard } from '../helpers/fixtures.js';

const TODAY = '2025-02-13';

const DEFAULT_SETTINGS: SessionSettings = {
  refreshMode: 'auto',
  refresh: DEFAULT_REFRESH_SETTINGS,
  favoriteTeam: 'LAL',
  gameSort: 'time',
  favoritesOnly: false,
  gameDate: '',
  timeZone: 'America/New_York'
};

function setup(settings: Partial<SessionSettings> = {}, clock: Clock = new FakeClock()) {
  const upstream = new FakeUpstream();
  upstream.scoreboards.set(
    TODAY,
    makeScoreboard([
      makeGame(1, { status: 3, statusText: 'Final', homeScore: 99, awayScore: 97, time: '2025-02-14T00:00:00Z' }),
      makeGame(2, {
        status: 2,
        statusText: 'Q2 3:00',
        home: 'LAL',
        homeScore: 50,
        awayScore: 48,
        period: 2,
        clock: 'PT03M00.00S',
        time: '2025-02-14T00:30:00Z'
      })
    ])
  );
  const fetcher = new RetryingFetcher({ limiter: new RateLimiter(0, clock), clock, options: { maxAttempts: 1 } });
  const data = new LeagueDataService({
    client: upstream,
    fetcher,
    store: new MemoryStore(),
    ttlSeconds: { games: 90, standings: 3600, leaders: 3600, gameDetail: 300, team: 3600 },
    offlineWindowSeconds: 86400,
    clock
  });
  const session = new DashboardSession(data, { ...DEFAULT_SETTINGS, ...settings }, { clock });
  return { upstream, data, session };
}

describe('DashboardSession', () => {
  describe('initial date', () => {
    it('should start on today in the configured time zone', () => {
      // 2025-02-13T12:00Z is 07:00 in New York
      expect(setup().session.date).toBe(TODAY);
    });

    it('should start on a configured past date', () => {
      expect(setup({ gameDate: '2025-01-10' }).session.date).toBe('2025-01-10');
    });

    it('should clamp a configured future date to today', () => {
      expect(setup({ gameDate: '2025-03-01' }).session.date).toBe(TODAY);
    });

    it('should reject an invalid configured date', () => {
      expect(() => setup({ gameDate: '2025-02-30' })).toThrow(ValidationError);
    });
  });

  describe('load', () => {
    it('should classify the games in display order with hotkeys and live clock', async () => {
      const { session } = setup();

      const snapshot = await session.load();

      expect(snapshot.date).toBe(TODAY);
      if (!snapshot.games.ok) throw new Error('games section failed');
      expect(snapshot.games.freshness).toBe('fresh');
      expect(snapshot.games.data.map(g => [g.hotkeyIndex, g.gameId, g.category, g.clockLabel])).toEqual([
        ['1', gameId(2), 'live', 'Q2 3:00'],
        ['2', gameId(1), 'final', '']
      ]);
      expect(snapshot.standings).toMatchObject({ ok: true, data: STANDINGS });
      expect(snapshot.leaders).toMatchObject({ ok: true, data: LEADERS });
      expect(snapshot.favoriteNotice).toBe('Your team is playing now');
      expect(snapshot.nextRefreshSeconds).toBe(30);
      expect(snapshot.changed).toBe(true);
    });

    it('should serve a second load from the cache and mark it unchanged', async () => {
      const { session, upstream } = setup();

      await session.load();
      const second = await session.load();

      expect(second.changed).toBe(false);
      expect([...upstream.calls].sort()).toEqual([`games:${TODAY}`, 'leaders', 'standings']);
    });

    it('should keep the other sections when one dataset fails', async () => {
      const { session, upstream } = setup();
      upstream.down.add('standings');

      const snapshot = await session.load();

      expect(snapshot.standings).toEqual({ ok: false, message: 'No connection. Check your network.' });
      expect(snapshot.games.ok).toBe(true);
      expect(snapshot.leaders.ok).toBe(true);
    });

    it('should notify snapshot listeners until they unsubscribe', async () => {
      const { session } = setup();
      const seen: DashboardSnapshot[] = [];
      const unsubscribe = session.onSnapshot(s => seen.push(s));

      await session.load();
      unsubscribe();
      await session.load();

      expect(seen).toHaveLength(1);
      expect(session.snapshot?.changed).toBe(false);
    });

    it('should raise CancelledError instead of a snapshot when cancelled', async () => {
      const { session } = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(session.load(controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(session.snapshot).toBeNull();
    });
  });

  describe('navigation', () => {
    it('should move between days and back to today', async () => {
      const { session, upstream } = setup();

      expect((await session.previousDay()).date).toBe('2025-02-12');
      expect((await session.previousDay()).date).toBe('2025-02-11');
      expect((await session.nextDay()).date).toBe('2025-02-12');
      expect((await session.today()).date).toBe(TODAY);
      expect((await session.goTo('2024-12-25')).date).toBe('2024-12-25');

      expect(upstream.count('games:2025-02-12')).toBe(1);
      expect(upstream.count('standings')).toBe(1);
    });

    it('should reject an invalid date', () => {
      const { session } = setup();
      expect(() => session.goTo('12/25/2024')).toThrow(ValidationError);
      expect(session.date).toBe(TODAY);
    });

    it('should toggle the favorites-only filter', async () => {
      const { session } = setup();

      const filtered = await session.toggleFavoritesOnly();
      const all = await session.toggleFavoritesOnly();

      expect(filtered.games.ok && filtered.games.data.map(g => g.gameId)).toEqual([gameId(2)]);
      expect(all.games.ok && all.games.data).toHaveLength(2);
    });
  });

  describe('refreshNow', () => {
    it('should go upstream again for games, standings and leaders', async () => {
      const { session, upstream } = setup();

      await session.load();
      await session.refreshNow();

      expect(upstream.count(`games:${TODAY}`)).toBe(2);
      expect(upstream.count('standings')).toBe(2);
      expect(upstream.count('leaders')).toBe(2);
    });
  });

  describe('openGame', () => {
    it('should load the box score of the game under the hotkey', async () => {
      const { session, upstream } = setup();
      await session.load();

      const view = await session.openGame('1');

      expect(upstream.calls).toContain(`game-detail:${gameId(2)}`);
      expect(view?.game.gameId).toBe(gameId(2));
      expect(view?.freshness).toBe('fresh');
      expect(view?.quarterScores).toEqual({
        headers: ['Q1', 'Q2', 'Q3', 'Q4', 'Total'],
        away: [24, 26, 22, 30, 102],
        home: [30, 25, 28, 27, 110]
      });
    });

    it('should go upstream again only when asked to refresh', async () => {
      const { session, upstream } = setup();
      await session.load();

      await session.openGame('1');
      await session.openGame('1');
      const refreshed = await session.openGame('1', { refresh: true });

      expect(upstream.count(`game-detail:${gameId(2)}`)).toBe(2);
      expect(refreshed?.freshness).toBe('fresh');
    });

    it('should list the players with a triple-double on each side', async () => {
      const { session, upstream } = setup();
      const detail = makeBoxScore(2);
      detail.homeTeam.players = [
        { personId: 1, name: 'Home Star', jerseyNum: '1', position: 'G', starter: true, statistics: { points: 21, reboundsTotal: 10, assists: 12 } },
        { personId: 2, name: 'Home Big', jerseyNum: '2', position: 'C', starter: true, statistics: { points: 18, reboundsTotal: 14, assists: 2 } }
      ];
      upstream.boxScores.set(gameId(2), detail);
      await session.load();

      const view = await session.openGame('1');

      expect(view?.tripleDoubles).toEqual({ away: [], home: ['Home Star'] });
    });

    it('should return null for a key no game carries', async () => {
      const { session, upstream } = setup();
      await session.load();

      await expect(session.openGame('9')).resolves.toBeNull();
      expect(upstream.calls.some(c => c.startsWith('game-detail'))).toBe(false);
    });
  });

  describe('openTeam', () => {
    it('should resolve the tricode through the standings and load the team page', async () => {
      const { session, upstream } = setup();

      const page = await session.openTeam('eas');

      expect(page?.team).toEqual({ teamId: 1, tricode: 'EAS', city: 'East City', name: 'Testers' });
      expect(page?.info).toMatchObject({ ok: true, freshness: 'fresh' });
      expect(upstream.count('team-info:1')).toBe(1);
      expect(upstream.count('team-roster:1')).toBe(1);
    });

    it('should return null for a team missing from the standings', async () => {
      const { session, upstream } = setup();

      await expect(session.openTeam('ZZZ')).resolves.toBeNull();
      expect(upstream.calls.some(c => c.startsWith('team-'))).toBe(false);
    });

    it('should refetch the team datasets when asked to refresh', async () => {
      const { session, upstream } = setup();

      await session.openTeam('EAS');
      await session.openTeam('EAS');
      await session.openTeam('EAS', { refresh: true });

      expect(upstream.count('team-info:1')).toBe(2);
      expect(upstream.count('team-games:1')).toBe(2);
      expect(upstream.count('team-roster:1')).toBe(2);
      expect(upstream.count('standings')).toBe(1);
    });

    it('should fail when the standings are unavailable', async () => {
      const { session, upstream } = setup();
      upstream.down.add('standings');

      await expect(session.openTeam('EAS')).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });
  });

  describe('run', () => {
    it('should reload on the refresh schedule and on manual refresh until stopped', async () => {
      const clock = new ManualClock();
      const { session, upstream } = setup({}, clock);
      const controller = new AbortController();
      const seen: DashboardSnapshot[] = [];
      session.onSnapshot(s => seen.push(s));

      const running = session.run(controller.signal);
      await vi.waitFor(() => expect(clock.pendingSleeps).toEqual([30_000]));
      expect(seen).toHaveLength(1);

      clock.releaseNext();
      await vi.waitFor(() => expect(seen).toHaveLength(2));
      // 30 seconds in, every dataset is still fresh
      expect(upstream.count(`games:${TODAY}`)).toBe(1);

      await vi.waitFor(() => expect(clock.pendingSleeps).toEqual([30_000]));
      const manual = await session.refreshNow();
      expect(manual).toBe(seen[2]);
      expect(upstream.count(`games:${TODAY}`)).toBe(2);

      await vi.waitFor(() => expect(clock.pendingSleeps).toEqual([30_000]));
      controller.abort();
      await expect(running).resolves.toBeUndefined();
      expect(clock.pendingSleeps).toEqual([]);
    });

    it('should wait for a manual refresh when automatic refresh is off', async () => {
      const clock = new ManualClock();
      const { session } = setup({ refreshMode: 'fixed', refresh: { ...DEFAULT_REFRESH_SETTINGS, fixedSeconds: 0 } }, clock);
      const controller = new AbortController();
      const seen: DashboardSnapshot[] = [];
      session.onSnapshot(s => seen.push(s));

      const running = session.run(controller.signal);
      await vi.waitFor(() => expect(clock.pendingSleeps).toEqual([3_600_000]));
      expect(seen).toHaveLength(1);
      expect(seen[0].nextRefreshSeconds).toBe(0);

      // the idle timer running out is not a reload
      clock.releaseNext();
      await vi.waitFor(() => expect(clock.pendingSleeps).toEqual([3_600_000]));
      await flush();
      expect(seen).toHaveLength(1);

      const manual = await session.refreshNow();
      expect(seen).toHaveLength(2);
      expect(manual).toBe(seen[1]);

      await vi.waitFor(() => expect(clock.pendingSleeps).toEqual([3_600_000]));
      controller.abort();
      await running;
      expect(clock.pendingSleeps).toEqual([]);
    });
  });
});

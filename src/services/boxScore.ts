/**
 * Box score helpers
 */

import type { BoxScoreTeam, GameTeam } from '../types/api.js';

export interface QuarterScores {
  /** 'Q1'..'Q4', then 'OT' when any overtime was played, then 'Total' */
  headers: string[];
  away: number[];
  home: number[];
}

const REGULATION = [1, 2, 3, 4];

/**
 * Score by quarter for both teams
 *
 * All overtime periods are summed into a single OT column. The total is
 * the team score, or the sum of the columns when upstream sent none.
 *
 * @returns null when neither team has period scores
 */
export function buildQuarterScores(
  away: Pick<GameTeam, 'periods' | 'score'>,
  home: Pick<GameTeam, 'periods' | 'score'>
): QuarterScores | null {
  if (away.periods.length === 0 && home.periods.length === 0) return null;

  const byPeriod = new Map<number, [number, number]>();
  const record = (period: number, side: 0 | 1, score: number) => {
    const row = byPeriod.get(period) ?? [0, 0];
    row[side] = score;
    byPeriod.set(period, row);
  };
  away.periods.forEach(p => record(p.period, 0, p.score));
  home.periods.forEach(p => record(p.period, 1, p.score));

  const at = (period: number, side: 0 | 1) => byPeriod.get(period)?.[side] ?? 0;
  const headers = ['Q1', 'Q2', 'Q3', 'Q4'];
  const awayScores = REGULATION.map(p => at(p, 0));
  const homeScores = REGULATION.map(p => at(p, 1));

  const overtime = [...byPeriod.keys()].filter(p => !REGULATION.includes(p));
  if (overtime.length > 0) {
    headers.push('OT');
    awayScores.push(overtime.reduce((sum, p) => sum + at(p, 0), 0));
    homeScores.push(overtime.reduce((sum, p) => sum + at(p, 1), 0));
  }

  const sum = (values: number[]) => values.reduce((a, b) => a + b, 0);
  const awayTotal = away.score ?? sum(awayScores);
  const homeTotal = home.score ?? sum(homeScores);
  headers.push('Total');
  awayScores.push(awayTotal);
  homeScores.push(homeTotal);
  return { headers, away: awayScores, home: homeScores };
}

const TRIPLE_DOUBLE_STATS = ['points', 'reboundsTotal', 'assists', 'steals', 'blocks'];

/**
 * Ten or more in at least three of points, rebounds, assists, steals and blocks
 */
export function isTripleDouble(stats: Readonly<Record<string, number | string>>): boolean {
  const doubles = TRIPLE_DOUBLE_STATS.filter(name => {
    const value = stats[name];
    return typeof value === 'number' && value >= 10;
  });
  return doubles.length >= 3;
}

/** Names of the team's players with a triple-double, in box score order */
export function tripleDoublePlayers(team: Pick<BoxScoreTeam, 'players'>): string[] {
  return team.players.filter(player => isTripleDouble(player.statistics)).map(player => player.name);
}

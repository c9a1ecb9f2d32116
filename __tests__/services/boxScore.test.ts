import { describe, it, expect } from 'vitest';
import { buildQuarterScores, isTripleDouble, tripleDoublePlayers } from '../../src/services/boxScore.js';

const periods = (...scores: number[]) => scores.map((score, i) => ({ period: i + 1, score }));

describe('boxScore', () => {
  describe('buildQuarterScores', () => {
    it('should list the four quarters and the team totals', () => {
      const result = buildQuarterScores(
        { periods: periods(24, 26, 22, 30), score: 102 },
        { periods: periods(30, 25, 28, 27), score: 110 }
      );

      expect(result).toEqual({
        headers: ['Q1', 'Q2', 'Q3', 'Q4', 'Total'],
        away: [24, 26, 22, 30, 102],
        home: [30, 25, 28, 27, 110]
      });
    });

    it('should sum every overtime period into one OT column', () => {
      const result = buildQuarterScores(
        { periods: periods(25, 25, 25, 25, 10, 8), score: 118 },
        { periods: periods(20, 30, 25, 25, 10, 5), score: 115 }
      );

      expect(result?.headers).toEqual(['Q1', 'Q2', 'Q3', 'Q4', 'OT', 'Total']);
      expect(result?.away).toEqual([25, 25, 25, 25, 18, 118]);
      expect(result?.home).toEqual([20, 30, 25, 25, 15, 115]);
    });

    it('should sum the columns when no total score is given', () => {
      const result = buildQuarterScores({ periods: periods(20, 22), score: null }, { periods: periods(18), score: null });

      expect(result).toEqual({
        headers: ['Q1', 'Q2', 'Q3', 'Q4', 'Total'],
        away: [20, 22, 0, 0, 42],
        home: [18, 0, 0, 0, 18]
      });
    });

    it('should return null before any period is played', () => {
      expect(buildQuarterScores({ periods: [], score: 0 }, { periods: [], score: 0 })).toBeNull();
    });
  });

  describe('isTripleDouble', () => {
    it('should need ten or more in three categories', () => {
      expect(isTripleDouble({ points: 25, reboundsTotal: 11, assists: 10, steals: 1, blocks: 0 })).toBe(true);
      expect(isTripleDouble({ points: 10, reboundsTotal: 4, assists: 10, steals: 10, blocks: 0 })).toBe(true);
      expect(isTripleDouble({ points: 40, reboundsTotal: 9, assists: 12, steals: 2, blocks: 1 })).toBe(false);
    });

    it('should ignore non-numeric and missing statistics', () => {
      expect(isTripleDouble({ points: 12, reboundsTotal: '10', assists: 10 })).toBe(false);
      expect(isTripleDouble({})).toBe(false);
    });
  });

  describe('tripleDoublePlayers', () => {
    it('should name the players with a triple-double in order', () => {
      const player = (personId: number, name: string, statistics: Record<string, number | string>) => ({
        personId,
        name,
        jerseyNum: '',
        position: '',
        starter: false,
        statistics
      });

      const names = tripleDoublePlayers({
        players: [
          player(1, 'First', { points: 10, reboundsTotal: 10, assists: 10 }),
          player(2, 'Second', { points: 30, reboundsTotal: 5, assists: 4 }),
          player(3, 'Third', { points: 12, steals: 10, blocks: 11 })
        ]
      });

      expect(names).toEqual(['First', 'Third']);
    });
  });
});

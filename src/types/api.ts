/**
 * NBA API Type Definitions
 *
 * Schemas for the data bridge responses. The same schemas decode payloads
 * read back from the persistent cache tier, so a hand-edited or truncated
 * cache file never reaches the classifier.
 */

import { z } from 'zod';

/**
 * Points scored by one team in one period
 */
export const periodScoreSchema = z.object({
  period: z.number().int(),
  score: z.number().default(0)
});

/**
 * Team line in a scoreboard game
 */
export const gameTeamSchema = z.object({
  teamId: z.number().int(),
  teamName: z.string().default(''),
  teamCity: z.string().default(''),
  teamTricode: z.string(),
  score: z.number().nullable().default(0),
  periods: z.array(periodScoreSchema).default([])
});

/**
 * One game on a scoreboard (raw game record)
 *
 * gameStatus follows NBA.com: 1 = scheduled, 2 = in progress, 3 = final.
 * gameClock is an ISO-8601 duration such as "PT05M30.00S".
 */
export const gameSchema = z.object({
  gameId: z.string(),
  gameStatus: z.number().int(),
  gameStatusText: z.string().default(''),
  period: z.number().int().default(0),
  gameClock: z.string().default(''),
  gameTimeUTC: z.string().default(''),
  homeTeam: gameTeamSchema,
  awayTeam: gameTeamSchema
});

/**
 * Daily scoreboard response
 */
export const scoreboardSchema = z.object({
  gameDate: z.string(),
  games: z.array(gameSchema)
});

/**
 * One row of the conference standings
 */
export const standingSchema = z.object({
  teamId: z.number().int(),
  teamCity: z.string(),
  teamName: z.string(),
  teamTricode: z.string().default(''),
  conference: z.enum(['East', 'West']),
  playoffRank: z.number().int(),
  wins: z.number().int(),
  losses: z.number().int(),
  winPct: z.number()
});

export const standingsSchema = z.object({
  season: z.string().default(''),
  teams: z.array(standingSchema)
});

/**
 * Player, team tricode and stat value (per-game average, or count for TDBL)
 */
export const leaderSchema = z.object({
  player: z.string(),
  team: z.string(),
  value: z.number()
});

export const leagueLeadersSchema = z.object({
  PTS: z.array(leaderSchema).default([]),
  REB: z.array(leaderSchema).default([]),
  AST: z.array(leaderSchema).default([]),
  TDBL: z.array(leaderSchema).default([])
});

export const boxScorePlayerSchema = z.object({
  personId: z.number().int(),
  name: z.string(),
  jerseyNum: z.string().default(''),
  position: z.string().default(''),
  starter: z.boolean().default(false),
  statistics: z.record(z.union([z.number(), z.string()])).default({})
});

export const boxScoreTeamSchema = gameTeamSchema.extend({
  players: z.array(boxScorePlayerSchema).default([])
});

/**
 * Single-game detail response
 */
export const boxScoreSchema = z.object({
  gameId: z.string(),
  gameStatus: z.number().int(),
  gameStatusText: z.string().default(''),
  period: z.number().int().default(0),
  gameClock: z.string().default(''),
  gameTimeUTC: z.string().default(''),
  homeTeam: boxScoreTeamSchema,
  awayTeam: boxScoreTeamSchema
});

/**
 * Team profile: season record and ranks
 */
export const teamInfoSchema = z.object({
  teamId: z.number().int(),
  teamCity: z.string(),
  teamName: z.string(),
  teamTricode: z.string(),
  conference: z.string().default(''),
  division: z.string().default(''),
  season: z.string().default(''),
  wins: z.number().int().default(0),
  losses: z.number().int().default(0),
  winPct: z.number().default(0),
  conferenceRank: z.number().int().nullable().default(null),
  divisionRank: z.number().int().nullable().default(null)
});

/**
 * One completed game in a team's season log, most recent first.
 * matchup reads "LAL vs. BOS" at home and "LAL @ BOS" away.
 */
export const teamGameSchema = z.object({
  gameId: z.string(),
  gameDate: z.string(),
  matchup: z.string(),
  result: z.enum(['W', 'L']).nullable().default(null),
  points: z.number().nullable().default(null)
});

export const teamGameLogSchema = z.object({
  teamId: z.number().int(),
  season: z.string().default(''),
  games: z.array(teamGameSchema)
});

export const rosterPlayerSchema = z.object({
  playerId: z.number().int(),
  name: z.string(),
  jerseyNum: z.string().default(''),
  position: z.string().default(''),
  height: z.string().default(''),
  weight: z.string().default(''),
  age: z.number().nullable().default(null)
});

export const teamRosterSchema = z.object({
  teamId: z.number().int(),
  season: z.string().default(''),
  players: z.array(rosterPlayerSchema)
});

export type PeriodScore = z.infer<typeof periodScoreSchema>;
export type GameTeam = z.infer<typeof gameTeamSchema>;
export type Game = z.infer<typeof gameSchema>;
export type Scoreboard = z.infer<typeof scoreboardSchema>;
export type Standing = z.infer<typeof standingSchema>;
export type Standings = z.infer<typeof standingsSchema>;
export type Leader = z.infer<typeof leaderSchema>;
export type LeagueLeaders = z.infer<typeof leagueLeadersSchema>;
export type BoxScorePlayer = z.infer<typeof boxScorePlayerSchema>;
export type BoxScoreTeam = z.infer<typeof boxScoreTeamSchema>;
export type BoxScore = z.infer<typeof boxScoreSchema>;
export type TeamInfo = z.infer<typeof teamInfoSchema>;
export type TeamGame = z.infer<typeof teamGameSchema>;
export type TeamGameLog = z.infer<typeof teamGameLogSchema>;
export type RosterPlayer = z.infer<typeof rosterPlayerSchema>;
export type TeamRoster = z.infer<typeof teamRosterSchema>;

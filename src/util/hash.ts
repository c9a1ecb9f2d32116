/**
 * Hash Utility Module
 *
 * Fingerprints classified game lists so a reload that changed nothing can
 * be told apart from one that moved a score or the clock.
 */

import crypto from 'crypto';
import type { GameState } from '../services/gameClassifier.js';

/**
 * @returns hexadecimal SHA256 digest (64 characters)
 */
export function sha256(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Hash of everything the game list shows. Two lists hash equal iff they
 * render identically.
 */
export function gamesFingerprint(states: readonly GameState[]): string {
  return sha256(
    JSON.stringify(
      states.map(s => [s.gameId, s.category, s.awayScore, s.homeScore, s.clockLabel, s.hotkeyIndex, s.statusText])
    )
  );
}

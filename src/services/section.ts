/**
 * One independently loaded part of a screen: the data with its freshness,
 * or the short message shown in its place
 */

import type { ServedFreshness } from '../cache/freshness.js';
import type { CacheResult } from '../cache/tieredCache.js';
import { userFacingMessage } from '../errors/index.js';

export type Section<T> =
  | { ok: true; data: T; freshness: ServedFreshness; fetchedAt: number }
  | { ok: false; message: string };

export function toSection<T, R>(
  result: PromiseSettledResult<CacheResult<T>>,
  prefix: string,
  map: (data: T) => R
): Section<R> {
  if (result.status === 'rejected') {
    return { ok: false, message: userFacingMessage(result.reason, prefix) };
  }
  const { payload, freshness, fetchedAt } = result.value;
  return { ok: true, data: map(payload), freshness, fetchedAt };
}

/**
 * State Encoder
 * Discretizes observable page signals into a finite state space
 *
 * Bucketing rule (the only way distinct feature tuples alias):
 *   size    tiny < 5 KB, small < 50 KB, medium < 500 KB, large otherwise
 *   js      js | nojs
 *   obs     "+"-joined names of raised obstruction flags (sorted), or none
 *   retry   0 | 1 | 2+
 * Missing or invalid values map to "unknown" in every dimension.
 * 5 × 3 × 9 × 4 = 540 possible states.
 */

import type { ObstructionFlags, PageFeatures, State } from './types';

export const UNKNOWN = 'unknown';

const SIZE_BUCKETS: ReadonlyArray<[limit: number, label: string]> = [
  [5_000, 'tiny'],
  [50_000, 'small'],
  [500_000, 'medium'],
];

const OBSTRUCTION_NAMES: ReadonlyArray<keyof ObstructionFlags> = ['captcha', 'loginWall', 'spinner'];

export interface StateBuckets {
  size: string;
  js: string;
  obs: string;
  retry: string;
}

function sizeBucket(htmlSize: number | undefined): string {
  if (htmlSize === undefined || !Number.isFinite(htmlSize) || htmlSize < 0) {
    return UNKNOWN;
  }
  for (const [limit, label] of SIZE_BUCKETS) {
    if (htmlSize < limit) {
      return label;
    }
  }
  return 'large';
}

function scriptBucket(hasScripts: boolean | undefined): string {
  if (typeof hasScripts !== 'boolean') {
    return UNKNOWN;
  }
  return hasScripts ? 'js' : 'nojs';
}

function obstructionBucket(obstructions: ObstructionFlags | undefined): string {
  if (!obstructions || typeof obstructions !== 'object') {
    return UNKNOWN;
  }
  const raised = OBSTRUCTION_NAMES.filter((name) => obstructions[name] === true);
  return raised.length > 0 ? raised.join('+') : 'none';
}

function retryBucket(priorFailures: number | undefined): string {
  if (priorFailures === undefined || !Number.isInteger(priorFailures) || priorFailures < 0) {
    return UNKNOWN;
  }
  if (priorFailures >= 2) {
    return '2+';
  }
  return String(priorFailures);
}

export function bucketize(features: PageFeatures = {}): StateBuckets {
  return {
    size: sizeBucket(features.htmlSize),
    js: scriptBucket(features.hasScripts),
    obs: obstructionBucket(features.obstructions),
    retry: retryBucket(features.priorFailures),
  };
}

/**
 * Encode page features into a state key, e.g. "size=small|js=nojs|obs=none|retry=0"
 */
export function encodeState(features: PageFeatures = {}): State {
  const b = bucketize(features);
  return `size=${b.size}|js=${b.js}|obs=${b.obs}|retry=${b.retry}`;
}

/**
 * Parse a state key back into its buckets. Unparseable keys yield null.
 */
export function describeState(state: State): StateBuckets | null {
  const parts = new Map<string, string>();
  for (const segment of state.split('|')) {
    const eq = segment.indexOf('=');
    if (eq <= 0) {
      return null;
    }
    parts.set(segment.slice(0, eq), segment.slice(eq + 1));
  }

  const size = parts.get('size');
  const js = parts.get('js');
  const obs = parts.get('obs');
  const retry = parts.get('retry');
  if (size === undefined || js === undefined || obs === undefined || retry === undefined) {
    return null;
  }
  return { size, js, obs, retry };
}

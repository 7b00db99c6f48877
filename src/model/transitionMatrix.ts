/**
 * Transition Matrix Estimation
 * 
 * Counts score-margin transitions in a dense series. Margins are binned into
 * integer buckets over [-maxDifferential, maxDifferential] (bucket = margin +
 * maxDifferential) and every pair of samples exactly `lag` grid steps apart
 * adds one to cell (bucket(from), bucket(to)).
 * 
 * The result is a raw count matrix. Turning rows into probabilities is left to
 * whoever consumes it.
 */

import { SERIES } from '../core/constants.js';
import { ValidationError } from '../errors/index.js';

/**
 * What to do with a margin beyond ±maxDifferential
 * - clamp: count it in the nearest edge bucket
 * - reject: throw ValidationError
 */
export type OutOfRangePolicy = 'clamp' | 'reject';

export interface TransitionMatrix {
  lag: number; // grid steps
  maxDifferential: number;
  size: number; // 2 * maxDifferential + 1
  counts: number[][];
  total: number;
  /** Samples that fell outside the range and were clamped */
  clamped: number;
}

export interface EstimateOptions {
  outOfRange?: OutOfRangePolicy;
}

/**
 * Converts a lag in seconds into grid steps of the 0.1 s series
 * 
 * @example
 * lagSecondsToSteps(2) // 20
 */
export function lagSecondsToSteps(lagSeconds: number, stepSeconds: number = SERIES.STEP_SECONDS): number {
  const steps = Math.round(lagSeconds / stepSeconds);
  if (!Number.isFinite(steps) || steps < 1) {
    throw new ValidationError(`Lag of ${lagSeconds}s is shorter than one ${stepSeconds}s step`, 'lag');
  }
  return steps;
}

/**
 * Bucket index of a margin
 */
export function marginBucket(margin: number, maxDifferential: number, policy: OutOfRangePolicy = 'clamp'): number {
  if (margin < -maxDifferential || margin > maxDifferential) {
    if (policy === 'reject') {
      throw new ValidationError(
        `Margin ${margin} outside [-${maxDifferential}, ${maxDifferential}]`,
        'maxDifferential'
      );
    }
    return margin < 0 ? 0 : 2 * maxDifferential;
  }
  return margin + maxDifferential;
}

/**
 * Builds the lagged count matrix
 * 
 * @param series - Anything with a dense margin column (a reconstructed series)
 * @param lag - Separation in grid steps (not seconds; see lagSecondsToSteps)
 * @param maxDifferential - Largest absolute margin with its own bucket
 */
export function estimateTransitionMatrix(
  series: { margins: ArrayLike<number> },
  lag: number,
  maxDifferential: number,
  options: EstimateOptions = {}
): TransitionMatrix {
  if (!Number.isInteger(lag) || lag < 1) {
    throw new ValidationError(`Lag must be a positive integer number of steps, got ${lag}`, 'lag');
  }
  if (!Number.isInteger(maxDifferential) || maxDifferential < 0) {
    throw new ValidationError(`maxDifferential must be a non-negative integer, got ${maxDifferential}`, 'maxDifferential');
  }

  const policy = options.outOfRange ?? 'clamp';
  const size = 2 * maxDifferential + 1;
  const counts = Array.from({ length: size }, () => new Array<number>(size).fill(0));
  const { margins } = series;

  let clamped = 0;
  const buckets = new Int32Array(margins.length);
  for (let i = 0; i < margins.length; i++) {
    const m = margins[i];
    if (m < -maxDifferential || m > maxDifferential) clamped++;
    buckets[i] = marginBucket(m, maxDifferential, policy);
  }

  let total = 0;
  for (let i = 0; i + lag < buckets.length; i++) {
    counts[buckets[i]][buckets[i + lag]]++;
    total++;
  }

  return { lag, maxDifferential, size, counts, total, clamped };
}

/**
 * Rate Limiter Utility
 * 
 * Keeps outbound requests to the statistics source strictly spaced.
 * Each call to wait() picks a fresh delay uniformly from [minDelayMs, maxDelayMs]
 * and blocks until that much time has passed since the previous wait() returned.
 */

import { sleep } from './sleep.js';
import { ValidationError } from '../errors/index.js';

export interface RateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  /** Clock source, milliseconds */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform random in [0, 1) */
  random?: () => number;
}

export class RateLimiter {
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  private lastCall = 0;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RateLimiterOptions) {
    if (
      !Number.isFinite(options.minDelayMs) ||
      !Number.isFinite(options.maxDelayMs) ||
      options.minDelayMs < 0 ||
      options.maxDelayMs < options.minDelayMs
    ) {
      throw new ValidationError(
        `Invalid rate limiter window [${options.minDelayMs}, ${options.maxDelayMs}]`,
        'delayMs'
      );
    }
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Blocks until the randomized gap since the previous call has elapsed
   * 
   * @returns The number of milliseconds actually waited
   */
  async wait(): Promise<number> {
    const delay = this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
    const elapsed = this.now() - this.lastCall;
    const remaining = delay - elapsed;
    if (remaining > 0) {
      await this.sleep(remaining);
    }
    this.lastCall = this.now();
    return Math.max(0, remaining);
  }
}

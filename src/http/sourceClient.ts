/**
 * Source Client
 * 
 * Fetches schedule and play-by-play pages from the statistics source.
 * Every request goes through the shared RateLimiter and is retried with
 * exponential backoff. A throttling response triggers a long cooldown before
 * the retry, separate from the normal inter-request delay.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { SENTINELS } from '../core/constants.js';
import { ApiError, ParseError, RateLimitError, ValidationError } from '../errors/index.js';
import { httpGetText } from '../util/http.js';
import { RateLimiter } from '../util/rateLimiter.js';
import { retryable } from '../util/retry.js';
import { sleep } from '../util/sleep.js';
import { scheduleMonthUrl, playByPlayUrl } from './sourceUrls.js';
import { parseSchedulePage } from '../scraper/scheduleParser.js';
import { parsePlayByPlayPage } from '../scraper/playByPlayParser.js';
import type { RawPlayEvent, ScheduledGame } from '../types/source.js';

/**
 * Process-wide limiter: all clients share one "last call" timestamp
 */
export const sourceRateLimiter = new RateLimiter({
  minDelayMs: cfg.source.minDelayMs,
  maxDelayMs: cfg.source.maxDelayMs
});

export interface SourceClientOptions {
  limiter?: RateLimiter;
  maxRetries?: number;
  baseDelayMs?: number;
  rateLimitCooldownMs?: number;
  months?: string[];
  /** Used for backoff and cooldown waits */
  sleep?: (ms: number) => Promise<void>;
}

export class SourceClient {
  private readonly limiter: RateLimiter;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly cooldownMs: number;
  private readonly months: string[];
  private readonly sleep: (ms: number) => Promise<void>;
  /**
   * fetchPage with bounded exponential-backoff retry; validation errors are
   * not retried, every other failure is
   */
  private readonly fetchWithRetry: (url: string) => Promise<string | null>;

  constructor(options: SourceClientOptions = {}) {
    this.limiter = options.limiter ?? sourceRateLimiter;
    this.maxRetries = options.maxRetries ?? cfg.retry.maxRetries;
    this.baseDelayMs = options.baseDelayMs ?? cfg.retry.baseDelayMs;
    this.cooldownMs = options.rateLimitCooldownMs ?? cfg.source.rateLimitCooldownMs;
    this.months = options.months ?? cfg.source.months;
    this.sleep = options.sleep ?? sleep;
    this.fetchWithRetry = retryable((url: string) => this.fetchPage(url), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      sleep: this.sleep,
      shouldRetry: (err) => !(err instanceof ValidationError),
      onRetry: (err, attempt, delayMs) => {
        logger.warn({ err, attempt, delayMs }, 'Request failed, retrying');
      }
    });
  }

  /**
   * Single rate-limited GET
   * 
   * @returns Page HTML, or null when the page does not exist (404)
   * @throws RateLimitError after the cooldown when the source throttles us
   * @throws ApiError on transport failures and other error statuses
   * @throws ParseError when a 200 response has an empty body
   */
  async fetchPage(url: string): Promise<string | null> {
    await this.limiter.wait();
    const res = await httpGetText(url, {
      headers: { 'User-Agent': cfg.source.userAgent },
      timeoutMs: cfg.source.timeoutMs
    });

    if (res.status === 429 || res.data?.includes(SENTINELS.RATE_LIMITED)) {
      logger.warn({ url, cooldownMs: this.cooldownMs }, 'Rate limited by source, cooling down');
      await this.sleep(this.cooldownMs);
      throw new RateLimitError(url, res.status);
    }
    if (res.status === 404) {
      return null;
    }
    if (res.status !== 200) {
      throw new ApiError(`Unexpected status ${res.status}`, url, res.status);
    }
    if (!res.data) {
      throw new ParseError('Empty response body', url);
    }
    return res.data;
  }

  /**
   * Lists every game of a season, one schedule page per month
   * 
   * A month whose page cannot be fetched contributes no games; the rest of the
   * season is still returned.
   */
  async fetchGameList(season: string): Promise<ScheduledGame[]> {
    logger.info({ season }, 'Fetching game list');
    const games: ScheduledGame[] = [];

    for (const month of this.months) {
      const url = scheduleMonthUrl(season, month);
      let html: string | null;
      try {
        html = await this.fetchWithRetry(url);
      } catch (err) {
        logger.error({ err, season, month, url }, 'Schedule page unreachable, skipping month');
        continue;
      }
      if (html === null) {
        logger.warn({ season, month, url }, 'Schedule page not found');
        continue;
      }

      const parsed = parseSchedulePage(html, season);
      if (parsed === null) {
        logger.warn({ season, month, url }, 'No schedule table on page');
        continue;
      }
      logger.info({ season, month, count: parsed.length }, 'Schedule month parsed');
      games.push(...parsed);
    }

    logger.info({ season, count: games.length }, 'Game list fetched');
    return games;
  }

  /**
   * Fetches and parses one game's play-by-play
   * 
   * @returns null when there is no usable data for the game (missing page,
   *   empty page, missing table, or no surviving events)
   * @throws the last fetch error when every retry failed
   */
  async fetchPlayByPlay(gameId: string): Promise<RawPlayEvent[] | null> {
    const url = playByPlayUrl(gameId);
    let html: string | null;
    try {
      html = await this.fetchWithRetry(url);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      logger.warn({ err, gameId, url }, 'Play-by-play page stayed empty');
      return null;
    }
    if (html === null) {
      logger.warn({ gameId, url }, 'Play-by-play page not found');
      return null;
    }

    const events = parsePlayByPlayPage(html, gameId);
    if (events === null) {
      logger.warn({ gameId, url }, 'No play-by-play events on page');
      return null;
    }
    logger.debug({ gameId, count: events.length }, 'Play-by-play parsed');
    return events;
  }
}

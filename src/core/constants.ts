/**
 * Application Constants
 * 
 * Game-clock geometry and sentinel values shared by the parser,
 * the normalizer and the model.
 */

/**
 * Game clock layout (in seconds)
 */
export const GAME_CLOCK = {
  /** Regulation quarters */
  REGULATION_PERIODS: 4,

  /** Length of a regulation quarter (12 minutes) */
  REGULATION_PERIOD_SECONDS: 720,

  /** Length of an overtime period (5 minutes) */
  OVERTIME_PERIOD_SECONDS: 300,

  /** Full regulation game (48 minutes) */
  REGULATION_SECONDS: 2880,
} as const;

/**
 * Dense series sampling
 */
export const SERIES = {
  /** Grid resolution of the reconstructed series */
  STEP_SECONDS: 0.1,

  /** Grid points per second (inverse of STEP_SECONDS, kept integral to avoid float drift) */
  TICKS_PER_SECOND: 10,
} as const;

/**
 * Textual markers emitted by the upstream source
 */
export const SENTINELS = {
  /** Margin placeholder when no score is attached to an event */
  NO_MARGIN: 'None',

  /** Margin placeholder for a level score */
  TIED: 'TIE',

  /** Score every game starts from */
  OPENING_SCORE: '0-0',

  /** Body text the source serves instead of a page when throttling */
  RATE_LIMITED: 'Rate Limit Exceeded',
} as const;

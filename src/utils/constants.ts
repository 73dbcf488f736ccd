/**
 * Injection token for TokenBucket module configuration
 */
export const TOKEN_BUCKET_CONFIG = 'TOKEN_BUCKET_CONFIG';

/**
 * Injection token for the clock shared by every registered bucket
 */
export const TOKEN_BUCKET_CLOCK = 'TOKEN_BUCKET_CLOCK';

/**
 * Metadata key for rate limited handlers and controllers
 */
export const RATE_LIMIT_KEY = 'token_bucket:rate_limit';

/**
 * Largest representable wait, used as the "no limit" maxWait
 */
export const INFINITY_DURATION = (1n << 63n) - 1n;

/**
 * Allowed relative error between a requested rate and the solved one
 */
export const RATE_MARGIN = 0.01;

/**
 * Upper bound on the quantum tried by the rate solver
 */
export const MAX_QUANTUM = 2 ** 50;

// setTimeout clamps anything longer than this to 1ms
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

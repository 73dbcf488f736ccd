import 'reflect-metadata';

// Module
export { TokenBucketModule } from './token-bucket.module';

// Services
export {
  TokenBucketService,
  TakeResult,
} from './services/token-bucket.service';

// Models
export {
  TokenBucket,
  newLimiter,
  newLimiterWithQuantum,
  newLimiterWithRate,
} from './models/token-bucket.model';

// Interfaces
export {
  TokenBucketModuleConfig,
  TokenBucketAsyncConfig,
  TokenBucketConfigFactory,
  TokenBucketOptions,
  IntervalBucketOptions,
  RateBucketOptions,
} from './interfaces/config.interface';
export { IClock } from './interfaces/clock.interface';
export {
  Reservation,
  TokenBucketParams,
} from './interfaces/token-bucket.interface';

// Clocks
export { SystemClock, systemClock } from './adapters/system-clock.adapter';
export { ManualClock } from './adapters/manual-clock.adapter';

// Decorators and interceptors
export {
  RateLimit,
  RateLimitOptions,
} from './decorators/rate-limit.decorator';
export { RateLimitInterceptor } from './interceptors/rate-limit.interceptor';

// Utilities
export {
  Duration,
  TokenAmount,
  nanoseconds,
  microseconds,
  milliseconds,
  seconds,
  fromMilliseconds,
  toMilliseconds,
} from './utils/duration';
export { solveRate } from './utils/rate-solver';
export {
  INFINITY_DURATION,
  RATE_LIMIT_KEY,
  RATE_MARGIN,
  TOKEN_BUCKET_CLOCK,
  TOKEN_BUCKET_CONFIG,
} from './utils/constants';

import { applyDecorators, SetMetadata, UseInterceptors } from '@nestjs/common';
import { RateLimitInterceptor } from '../interceptors/rate-limit.interceptor';
import { RATE_LIMIT_KEY } from '../utils/constants';

export { RATE_LIMIT_KEY };

/**
 * Rate limit options
 */
export interface RateLimitOptions {
  /**
   * Name of the registered bucket to draw tokens from
   */
  bucket: string;

  /**
   * Tokens each call costs
   * @default 1
   */
  count?: number;

  /**
   * Longest a call may be held back before it is rejected with 429.
   * Calls wait as long as needed when omitted.
   */
  maxWaitMs?: number;
}

/**
 * Throttles a handler, or every handler of a controller, through a
 * token bucket. Calls are delayed until their tokens are available, or
 * rejected with 429 Too Many Requests when that takes longer than
 * `maxWaitMs`. Options on a method override those on its class.
 *
 * @example
 * ```typescript
 * @Controller('reports')
 * export class ReportController {
 *   @Post()
 *   @RateLimit({ bucket: 'report-generation', count: 5, maxWaitMs: 2000 })
 *   async generate(@Body() dto: ReportDto) {
 *     return this.reports.generate(dto);
 *   }
 * }
 * ```
 */
export function RateLimit(options: RateLimitOptions) {
  return applyDecorators(
    SetMetadata(RATE_LIMIT_KEY, {
      bucket: options.bucket,
      count: options.count ?? 1,
      maxWaitMs: options.maxWaitMs,
    }),
    UseInterceptors(RateLimitInterceptor),
  );
}

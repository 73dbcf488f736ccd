import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { defer, Observable, switchMap } from 'rxjs';
import { TokenBucketService } from '../services/token-bucket.service';
import { RateLimitOptions } from '../decorators/rate-limit.decorator';
import { RATE_LIMIT_KEY } from '../utils/constants';

/**
 * Calls already admitted. @RateLimit on both a controller and one of its
 * methods binds this interceptor twice for the same call, and Nest hands
 * both bindings the same execution context.
 */
const admittedCalls = new WeakSet<ExecutionContext>();

/**
 * Interceptor that holds back calls to handlers marked with @RateLimit()
 * until the bucket has tokens for them
 */
@Injectable()
export class RateLimitInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RateLimitInterceptor.name);

  constructor(
    private readonly tokenBucketService: TokenBucketService,
    private readonly reflector: Reflector,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const options = this.reflector.getAllAndOverride<
      RateLimitOptions | undefined
    >(RATE_LIMIT_KEY, [context.getHandler(), context.getClass()]);

    if (!options || admittedCalls.has(context)) {
      return next.handle();
    }
    admittedCalls.add(context);

    return defer(() => this.admit(options)).pipe(
      switchMap(() => next.handle()),
    );
  }

  private async admit(options: RateLimitOptions): Promise<void> {
    const count = options.count ?? 1;
    const maxWaitMs = options.maxWaitMs ?? Infinity;

    const admitted = await this.tokenBucketService.waitMaxDuration(
      options.bucket,
      count,
      maxWaitMs,
    );

    if (!admitted) {
      this.logger.debug(
        `Rejecting call on '${options.bucket}', no tokens within ${maxWaitMs}ms`,
      );
      throw new HttpException(
        'Too Many Requests',
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
  }
}

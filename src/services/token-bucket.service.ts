import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  TokenBucketModuleConfig,
  TokenBucketOptions,
} from '../interfaces/config.interface';
import { IClock } from '../interfaces/clock.interface';
import { TokenBucket } from '../models/token-bucket.model';
import { createBucket } from '../utils/bucket.factory';
import { TOKEN_BUCKET_CLOCK, TOKEN_BUCKET_CONFIG } from '../utils/constants';
import { fromMilliseconds, toMilliseconds } from '../utils/duration';

/**
 * Result of a bounded take, in milliseconds
 */
export interface TakeResult {
  waitTimeMs: number;
  ok: boolean;
}

@Injectable()
export class TokenBucketService implements OnModuleInit {
  private readonly logger = new Logger(TokenBucketService.name);
  private readonly buckets: Map<string, TokenBucket> = new Map();

  constructor(
    @Inject(TOKEN_BUCKET_CONFIG)
    config: TokenBucketModuleConfig,
    @Inject(TOKEN_BUCKET_CLOCK)
    private readonly clock: IClock,
  ) {
    for (const options of config.buckets ?? []) {
      this.buckets.set(options.name, createBucket(options, clock));
    }
  }

  onModuleInit() {
    for (const [name, bucket] of this.buckets.entries()) {
      this.logger.log(
        `Registered token bucket: ${name} (capacity ${bucket.capacity}, ${bucket.rate()} tokens/s)`,
      );
    }
  }

  /**
   * Register a bucket at runtime, e.g. one per user
   *
   * @param options Bucket definition
   * @returns True if registered, false if a bucket with this name already exists
   */
  registerBucket(options: TokenBucketOptions): boolean {
    if (this.buckets.has(options.name)) {
      this.logger.debug(`Token bucket '${options.name}' already exists`);
      return false;
    }

    const bucket = createBucket(options, this.clock);
    this.buckets.set(options.name, bucket);
    this.logger.log(
      `Registered token bucket '${options.name}' at ${bucket.rate()} tokens/s`,
    );
    return true;
  }

  /**
   * Remove a bucket. Tokens it still owed are forgotten.
   *
   * @returns True if unregistered, false if no such bucket
   */
  unregisterBucket(name: string): boolean {
    if (!this.buckets.delete(name)) {
      return false;
    }
    this.logger.log(`Unregistered token bucket '${name}'`);
    return true;
  }

  getBucket(name: string): TokenBucket | undefined {
    return this.buckets.get(name);
  }

  hasBucket(name: string): boolean {
    return this.buckets.has(name);
  }

  bucketNames(): string[] {
    return [...this.buckets.keys()];
  }

  /**
   * Reserve tokens, waiting as long as needed
   *
   * @returns Milliseconds the caller must wait before using the tokens
   */
  take(name: string, count = 1): number {
    const bucket = this.resolve(name);
    if (!bucket) {
      return 0;
    }

    const waitTimeMs = toMilliseconds(bucket.take(count));
    this.logger.debug(
      `Reserved ${count} token(s) from '${name}', wait ${waitTimeMs}ms`,
    );
    return waitTimeMs;
  }

  /**
   * Reserve tokens only if the wait is at most `maxWaitMs`.
   * A refused reservation consumes nothing.
   */
  takeMaxDuration(name: string, count: number, maxWaitMs: number): TakeResult {
    const bucket = this.resolve(name);
    if (!bucket) {
      return { waitTimeMs: 0, ok: true };
    }

    const { waitTime, ok } = bucket.takeMaxDuration(
      count,
      fromMilliseconds(maxWaitMs),
    );
    if (!ok) {
      this.logger.debug(
        `Refused ${count} token(s) from '${name}', wait exceeds ${maxWaitMs}ms`,
      );
    }
    return { waitTimeMs: toMilliseconds(waitTime), ok };
  }

  /**
   * Take whatever is available right now, up to `count`
   *
   * @returns Number of tokens taken
   */
  takeAvailable(name: string, count: number): number {
    const bucket = this.resolve(name);
    if (!bucket) {
      return count;
    }
    return Number(bucket.takeAvailable(count));
  }

  /**
   * Current token count, negative while reserved tokens are still owed
   */
  available(name: string): number | undefined {
    const bucket = this.buckets.get(name);
    return bucket ? Number(bucket.available()) : undefined;
  }

  rate(name: string): number | undefined {
    return this.buckets.get(name)?.rate();
  }

  capacity(name: string): number | undefined {
    const bucket = this.buckets.get(name);
    return bucket ? Number(bucket.capacity) : undefined;
  }

  /**
   * Reserve tokens and resolve once they may be used
   */
  async wait(name: string, count = 1): Promise<void> {
    const bucket = this.resolve(name);
    if (!bucket) {
      return;
    }
    await bucket.wait(count);
  }

  /**
   * Reserve tokens if the wait is at most `maxWaitMs` and resolve once
   * they may be used
   *
   * @returns False, without waiting, when the reservation was refused
   */
  async waitMaxDuration(
    name: string,
    count: number,
    maxWaitMs: number,
  ): Promise<boolean> {
    const bucket = this.resolve(name);
    if (!bucket) {
      return true;
    }

    const ok = await bucket.waitMaxDuration(count, fromMilliseconds(maxWaitMs));
    if (!ok) {
      this.logger.debug(
        `Refused ${count} token(s) from '${name}', wait exceeds ${maxWaitMs}ms`,
      );
    }
    return ok;
  }

  private resolve(name: string): TokenBucket | undefined {
    const bucket = this.buckets.get(name);
    if (!bucket) {
      // No bucket means no limiting
      this.logger.warn(`No token bucket registered under '${name}'`);
    }
    return bucket;
  }
}

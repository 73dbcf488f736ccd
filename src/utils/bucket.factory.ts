import { IClock } from '../interfaces/clock.interface';
import {
  RateBucketOptions,
  TokenBucketOptions,
} from '../interfaces/config.interface';
import {
  newLimiterWithQuantum,
  newLimiterWithRate,
  TokenBucket,
} from '../models/token-bucket.model';
import { fromMilliseconds } from './duration';

export function isRateBucketOptions(
  options: TokenBucketOptions,
): options is RateBucketOptions {
  return options.rate !== undefined;
}

/**
 * Creates the bucket described by the options
 *
 * @param options Bucket definition, either rate based or interval based
 * @param clock Clock the bucket reads and sleeps with
 * @returns A full bucket
 */
export function createBucket(
  options: TokenBucketOptions,
  clock: IClock,
): TokenBucket {
  if (isRateBucketOptions(options)) {
    return newLimiterWithRate(options.rate, options.capacity, clock);
  }

  return newLimiterWithQuantum(
    fromMilliseconds(options.fillIntervalMs),
    options.quantum ?? 1,
    options.capacity,
    clock,
  );
}

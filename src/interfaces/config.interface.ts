import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { IClock } from './clock.interface';

interface BaseBucketOptions {
  /**
   * Unique name for the bucket.
   * Callers using the same name share the same tokens.
   */
  name: string;

  /**
   * Maximum number of tokens the bucket can hold (burst size)
   */
  capacity: number;
}

/**
 * Bucket defined by an explicit fill interval and quantum
 */
export interface IntervalBucketOptions extends BaseBucketOptions {
  /**
   * Time between two fills, in milliseconds (fractions allowed)
   */
  fillIntervalMs: number;

  /**
   * Tokens added on each fill
   * @default 1
   */
  quantum?: number;

  rate?: never;
}

/**
 * Bucket defined by an average rate
 */
export interface RateBucketOptions extends BaseBucketOptions {
  /**
   * Tokens per second. The actual rate is within 1% of this value.
   */
  rate: number;

  fillIntervalMs?: never;
  quantum?: never;
}

export type TokenBucketOptions = IntervalBucketOptions | RateBucketOptions;

/**
 * Configuration for the TokenBucket module
 */
export interface TokenBucketModuleConfig {
  /**
   * Buckets to register when the module starts
   */
  buckets?: TokenBucketOptions[];

  /**
   * Clock used by every bucket.
   * Defaults to the process' monotonic clock.
   */
  clock?: IClock;
}

/**
 * Interface for async config factory
 */
export interface TokenBucketConfigFactory {
  createTokenBucketConfig():
    | Promise<TokenBucketModuleConfig>
    | TokenBucketModuleConfig;
}

/**
 * Options for async module configuration
 */
export interface TokenBucketAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Existing provider implementing the config factory interface
   */
  useExisting?: Type<TokenBucketConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<TokenBucketConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?: (
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    ...args: any[]
  ) => Promise<TokenBucketModuleConfig> | TokenBucketModuleConfig;

  /**
   * Dependencies to inject into factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}

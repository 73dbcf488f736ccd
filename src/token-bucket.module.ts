import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  TokenBucketAsyncConfig,
  TokenBucketConfigFactory,
  TokenBucketModuleConfig,
} from './interfaces/config.interface';
import { IClock } from './interfaces/clock.interface';
import { TokenBucketService } from './services/token-bucket.service';
import { RateLimitInterceptor } from './interceptors/rate-limit.interceptor';
import { systemClock } from './adapters/system-clock.adapter';
import { TOKEN_BUCKET_CLOCK, TOKEN_BUCKET_CONFIG } from './utils/constants';

export function validateConfig(config: TokenBucketModuleConfig): void {
  const names = new Set<string>();

  for (const bucket of config.buckets ?? []) {
    const { name } = bucket;
    if (!name) {
      throw new Error('Each token bucket must have a name');
    }

    if (names.has(name)) {
      throw new Error(`Duplicate token bucket name '${name}'`);
    }
    names.add(name);

    if (bucket.rate === undefined && bucket.fillIntervalMs === undefined) {
      throw new Error(
        `Token bucket '${name}' must define either rate or fillIntervalMs`,
      );
    }
  }
}

const clockProvider: Provider = {
  provide: TOKEN_BUCKET_CLOCK,
  useFactory: (config: TokenBucketModuleConfig): IClock =>
    config.clock ?? systemClock,
  inject: [TOKEN_BUCKET_CONFIG],
};

/**
 * Main module for token buckets. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class TokenBucketModule {
  /**
   * Register the module with static configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     TokenBucketModule.forRoot({
   *       buckets: [
   *         { name: 'outbound-api', fillIntervalMs: 250, capacity: 10 },
   *         { name: 'disk-io', rate: 5 * 1024 * 1024, capacity: 1024 * 1024 },
   *       ],
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: TokenBucketModuleConfig = {}): DynamicModule {
    validateConfig(config);

    return {
      module: TokenBucketModule,
      global: true,
      providers: [
        { provide: TOKEN_BUCKET_CONFIG, useValue: config },
        clockProvider,
        TokenBucketService,
        RateLimitInterceptor,
      ],
      exports: [TokenBucketService, RateLimitInterceptor, TOKEN_BUCKET_CLOCK],
    };
  }

  /**
   * Register the module with async configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     TokenBucketModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) => ({
   *         buckets: [
   *           {
   *             name: 'outbound-api',
   *             rate: configService.get<number>('OUTBOUND_RATE', 4),
   *             capacity: configService.get<number>('OUTBOUND_BURST', 10),
   *           },
   *         ],
   *       }),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: TokenBucketAsyncConfig): DynamicModule {
    const providers: Provider[] = [
      TokenBucketModule.createAsyncConfigProvider(asyncConfig),
      clockProvider,
      TokenBucketService,
      RateLimitInterceptor,
    ];

    if (asyncConfig.useClass) {
      providers.push({
        provide: asyncConfig.useClass,
        useClass: asyncConfig.useClass,
      });
    }

    return {
      module: TokenBucketModule,
      global: true,
      imports: asyncConfig.imports || [],
      providers,
      exports: [TokenBucketService, RateLimitInterceptor, TOKEN_BUCKET_CLOCK],
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: TokenBucketAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: TOKEN_BUCKET_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateConfig(config);
          return config;
        },
        inject: options.inject || [],
      };
    }

    const factoryClass = options.useClass ?? options.useExisting;
    if (factoryClass) {
      return {
        provide: TOKEN_BUCKET_CONFIG,
        useFactory: async (configFactory: TokenBucketConfigFactory) => {
          const config = await configFactory.createTokenBucketConfig();
          validateConfig(config);
          return config;
        },
        inject: [factoryClass],
      };
    }

    throw new Error(
      'Invalid TokenBucketAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}

/**
 * Example of how to configure and register the TokenBucket module in a NestJS application
 */
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TokenBucketModule } from '../src';
import { GeocodingClient } from './throttled-client-example';
import { ReportController } from './controller-example';

/**
 * Example module using static configuration
 */
@Module({
  imports: [
    TokenBucketModule.forRoot({
      buckets: [
        // One token every 250ms, bursts of up to 10 calls
        { name: 'geocoding-api', fillIntervalMs: 250, capacity: 10 },
        // 5 report credits per second, in bursts of 20
        { name: 'report-generation', rate: 5, capacity: 20 },
      ],
    }),
  ],
  controllers: [ReportController],
  providers: [GeocodingClient],
  exports: [GeocodingClient],
})
export class StaticConfigThrottlingModule {}

/**
 * Example module using async configuration (recommended for production)
 */
@Module({
  imports: [
    ConfigModule.forRoot(),
    TokenBucketModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        buckets: [
          {
            name: 'geocoding-api',
            rate: Number(configService.get('GEOCODING_RATE') || '4'),
            capacity: Number(configService.get('GEOCODING_BURST') || '10'),
          },
          {
            name: 'report-generation',
            fillIntervalMs: Number(
              configService.get('REPORT_FILL_INTERVAL_MS') || '200',
            ),
            capacity: Number(configService.get('REPORT_BURST') || '20'),
          },
        ],
      }),
    }),
  ],
  controllers: [ReportController],
  providers: [GeocodingClient],
  exports: [GeocodingClient],
})
export class AsyncConfigThrottlingModule {}

/**
 * Example of throttling calls to an external API with TokenBucketService
 */
import { Injectable, Logger } from '@nestjs/common';
import { TokenBucketService } from '../src';

export interface GeocodeResult {
  address: string;
  latitude: number;
  longitude: number;
}

@Injectable()
export class GeocodingClient {
  private readonly logger = new Logger(GeocodingClient.name);

  constructor(private readonly tokenBucketService: TokenBucketService) {}

  /**
   * Geocode an address, waiting for a token first so the upstream
   * quota is never exceeded
   */
  async geocode(address: string): Promise<GeocodeResult> {
    await this.tokenBucketService.wait('geocoding-api');
    return this.fetchFromUpstream(address);
  }

  /**
   * Geocode a batch, asking for one token per address.
   * Gives up if the batch would have to wait more than 5 seconds.
   */
  async geocodeBatch(addresses: string[]): Promise<GeocodeResult[] | null> {
    const admitted = await this.tokenBucketService.waitMaxDuration(
      'geocoding-api',
      addresses.length,
      5000,
    );

    if (!admitted) {
      this.logger.warn(
        `Batch of ${addresses.length} addresses rejected, quota exhausted`,
      );
      return null;
    }

    return Promise.all(addresses.map((a) => this.fetchFromUpstream(a)));
  }

  /**
   * Best-effort prefetch: only geocode as many addresses as the bucket
   * allows right now
   */
  async prefetch(addresses: string[]): Promise<GeocodeResult[]> {
    const granted = this.tokenBucketService.takeAvailable(
      'geocoding-api',
      addresses.length,
    );

    return Promise.all(
      addresses.slice(0, granted).map((a) => this.fetchFromUpstream(a)),
    );
  }

  private async fetchFromUpstream(address: string): Promise<GeocodeResult> {
    // Replace with a real HTTP call
    return { address, latitude: 0, longitude: 0 };
  }
}

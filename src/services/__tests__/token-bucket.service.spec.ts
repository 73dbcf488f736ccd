import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { TokenBucketService } from '../token-bucket.service';
import { ManualClock } from '../../adapters/manual-clock.adapter';
import { TokenBucketModuleConfig } from '../../interfaces/config.interface';
import {
  TOKEN_BUCKET_CLOCK,
  TOKEN_BUCKET_CONFIG,
} from '../../utils/constants';
import { milliseconds } from '../../utils/duration';

describe('TokenBucketService', () => {
  let service: TokenBucketService;
  let clock: ManualClock;

  beforeEach(async () => {
    clock = new ManualClock();

    const config: TokenBucketModuleConfig = {
      buckets: [
        { name: 'api', fillIntervalMs: 250, capacity: 10 },
        { name: 'disk', rate: 1000, capacity: 100 },
      ],
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TokenBucketService,
        { provide: TOKEN_BUCKET_CONFIG, useValue: config },
        { provide: TOKEN_BUCKET_CLOCK, useValue: clock },
      ],
    }).compile();

    service = module.get<TokenBucketService>(TokenBucketService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('configured buckets', () => {
    it('should register every configured bucket', () => {
      expect(service.bucketNames()).toEqual(['api', 'disk']);
      expect(service.capacity('api')).toBe(10);
      expect(service.rate('api')).toBe(4);
      expect(service.rate('disk')).toBe(1000);
    });

    it('should log the registered buckets on init', () => {
      const logSpy = jest
        .spyOn(Logger.prototype, 'log')
        .mockImplementation(() => undefined);

      service.onModuleInit();

      expect(logSpy).toHaveBeenCalledWith(
        'Registered token bucket: api (capacity 10, 4 tokens/s)',
      );
    });
  });

  describe('take', () => {
    it('should return the wait in milliseconds', () => {
      expect(service.take('api', 10)).toBe(0);
      expect(service.take('api')).toBe(250);
      expect(service.take('api', 2)).toBe(750);
    });

    it('should not limit an unknown bucket', () => {
      const warnSpy = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);

      expect(service.take('missing', 1000)).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        "No token bucket registered under 'missing'",
      );
    });
  });

  describe('takeMaxDuration', () => {
    it('should refuse without consuming when the wait is too long', () => {
      service.take('api', 10);

      expect(service.takeMaxDuration('api', 1, 100)).toEqual({
        waitTimeMs: 0,
        ok: false,
      });
      expect(service.available('api')).toBe(0);
      expect(service.takeMaxDuration('api', 1, 250)).toEqual({
        waitTimeMs: 250,
        ok: true,
      });
      expect(service.available('api')).toBe(-1);
    });

    it('should accept an unbounded budget', () => {
      service.take('api', 10);

      expect(service.takeMaxDuration('api', 4, Infinity)).toEqual({
        waitTimeMs: 1000,
        ok: true,
      });
    });
  });

  describe('takeAvailable', () => {
    it('should take at most what the bucket holds', () => {
      expect(service.takeAvailable('api', 15)).toBe(10);
      expect(service.takeAvailable('api', 1)).toBe(0);

      clock.advance(milliseconds(500));

      expect(service.takeAvailable('api', 5)).toBe(2);
    });

    it('should hand out the full count for an unknown bucket', () => {
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      expect(service.takeAvailable('missing', 7)).toBe(7);
    });
  });

  describe('available', () => {
    it('should report undefined for an unknown bucket', () => {
      expect(service.available('missing')).toBeUndefined();
      expect(service.rate('missing')).toBeUndefined();
      expect(service.capacity('missing')).toBeUndefined();
    });
  });

  describe('registerBucket', () => {
    it('should register a rate based bucket', () => {
      const result = service.registerBucket({
        name: 'user:1',
        rate: 4,
        capacity: 2,
      });

      expect(result).toBe(true);
      expect(service.hasBucket('user:1')).toBe(true);
      expect(service.rate('user:1')).toBe(4);
      expect(service.available('user:1')).toBe(2);
    });

    it('should return false if a bucket with the same name exists', () => {
      expect(
        service.registerBucket({ name: 'api', fillIntervalMs: 1, capacity: 1 }),
      ).toBe(false);
      expect(service.capacity('api')).toBe(10);
    });

    it('should throw on invalid parameters', () => {
      expect(() =>
        service.registerBucket({ name: 'bad', fillIntervalMs: 0, capacity: 1 }),
      ).toThrow('token bucket fill interval is not > 0');
      expect(() =>
        service.registerBucket({ name: 'bad', rate: 5, capacity: 0 }),
      ).toThrow('token bucket capacity is not > 0');
      expect(service.hasBucket('bad')).toBe(false);
    });
  });

  describe('unregisterBucket', () => {
    it('should remove a registered bucket', () => {
      expect(service.unregisterBucket('disk')).toBe(true);
      expect(service.hasBucket('disk')).toBe(false);
      expect(service.bucketNames()).toEqual(['api']);
    });

    it('should return false if the bucket does not exist', () => {
      expect(service.unregisterBucket('missing')).toBe(false);
    });
  });

  describe('wait', () => {
    it('should resolve once the reserved tokens have accrued', async () => {
      await service.wait('api', 10);

      let resolved = false;
      const pending = service.wait('api').then(() => {
        resolved = true;
      });

      expect(clock.pendingSleepers).toBe(1);
      expect(resolved).toBe(false);

      clock.advance(milliseconds(250));
      await pending;

      expect(resolved).toBe(true);
    });

    it('should refuse immediately when the budget is too small', async () => {
      await service.wait('api', 10);

      await expect(service.waitMaxDuration('api', 1, 249)).resolves.toBe(false);
      expect(clock.pendingSleepers).toBe(0);
      expect(service.available('api')).toBe(0);
    });

    it('should wait within the budget', async () => {
      await service.wait('api', 10);

      const pending = service.waitMaxDuration('api', 1, 250);
      clock.advance(milliseconds(250));

      await expect(pending).resolves.toBe(true);
    });
  });
});

import { Logger } from '@nestjs/common';
import { IClock } from '../interfaces/clock.interface';
import { Duration } from '../utils/duration';

interface Sleeper {
  deadline: Duration;
  resolve: () => void;
}

/**
 * Clock whose time only moves when told to.
 * This adapter is suitable for tests that need deterministic waits.
 */
export class ManualClock implements IClock {
  private readonly logger = new Logger(ManualClock.name);
  private current: Duration;
  private sleepers: Sleeper[] = [];

  constructor(start: Duration = 0n) {
    this.current = start;
  }

  now(): Duration {
    return this.current;
  }

  /**
   * Resolves when the clock has been advanced to `now() + duration`
   */
  sleep(duration: Duration): Promise<void> {
    if (duration <= 0n) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.sleepers.push({ deadline: this.current + duration, resolve });
    });
  }

  /**
   * Move the clock forward, waking every sleeper whose deadline has passed
   * @param duration Amount of time to add, must not be negative
   */
  advance(duration: Duration): void {
    if (duration < 0n) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.set(this.current + duration);
  }

  /**
   * Jump to an absolute instant
   * @param instant New time, must not be earlier than the current one
   */
  set(instant: Duration): void {
    if (instant < this.current) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.current = instant;

    const due = this.sleepers.filter((s) => s.deadline <= instant);
    this.sleepers = this.sleepers.filter((s) => s.deadline > instant);
    if (due.length > 0) {
      this.logger.debug(`Waking ${due.length} sleeper(s) at ${instant}ns`);
    }
    due.forEach((s) => s.resolve());
  }

  get pendingSleepers(): number {
    return this.sleepers.length;
  }
}

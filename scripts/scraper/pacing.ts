import { log } from './logger';
import { randomBetween, systemClock } from './utils';
import type { Clock, ScrapeConfig } from './types';

export const WINDOW_MS = 60_000;
export const PEAK_COOLDOWN_MS = 60_000;

export type PacingConfig = Pick<
  ScrapeConfig,
  'minDelayMs' | 'maxDelayMs' | 'maxRequestsPerMinute' | 'avoidPeakHours' | 'peakStartHour' | 'peakEndHour'
>;

export const isPeakHour = (hour: number, start: number, end: number): boolean =>
  start <= end ? hour >= start && hour <= end : hour >= start || hour <= end;

/**
 * Decides when the next outbound page request may fire.
 *
 * Keeps a rolling one-minute window of request timestamps and a randomized
 * minimum gap between requests. Concurrent callers are queued, so the window
 * and the gap are only ever evaluated by one turn at a time.
 */
export class PacingScheduler {
  private requestTimes: number[] = [];
  private lastRequestAt = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: PacingConfig,
    private readonly clock: Clock = systemClock,
    private readonly random: () => number = Math.random,
    private readonly hourOf: (ms: number) => number = (ms) => new Date(ms).getHours()
  ) {}

  awaitTurn(): Promise<void> {
    const turn = this.queue.then(() => this.takeTurn());
    this.queue = turn;
    return turn;
  }

  /** Timestamps currently inside the trailing window. */
  get recentRequests(): readonly number[] {
    return this.requestTimes;
  }

  private async takeTurn(): Promise<void> {
    const { avoidPeakHours, peakStartHour, peakEndHour, maxRequestsPerMinute } = this.config;

    if (avoidPeakHours && isPeakHour(this.hourOf(this.clock.now()), peakStartHour, peakEndHour)) {
      log(`⏰ Peak hours (${peakStartHour}:00-${peakEndHour}:59). Cooling down ${PEAK_COOLDOWN_MS / 1000}s...`);
      await this.clock.sleep(PEAK_COOLDOWN_MS);
    }

    this.prune(this.clock.now());

    if (this.requestTimes.length >= maxRequestsPerMinute) {
      const wait = WINDOW_MS - (this.clock.now() - this.requestTimes[0]);
      if (wait > 0) {
        log(`⏳ Rate limit reached. Waiting ${(wait / 1000).toFixed(1)}s...`);
        await this.clock.sleep(wait);
      }
      this.prune(this.clock.now());
    }

    const gap = randomBetween(this.config.minDelayMs, this.config.maxDelayMs, this.random);
    const sinceLast = this.clock.now() - this.lastRequestAt;
    if (sinceLast < gap) {
      const wait = gap - sinceLast;
      log(`💤 Respectful delay: ${(wait / 1000).toFixed(1)}s`);
      await this.clock.sleep(wait);
    }

    const at = this.clock.now();
    this.requestTimes.push(at);
    this.lastRequestAt = at;
  }

  private prune(now: number): void {
    const cutoff = now - WINDOW_MS;
    this.requestTimes = this.requestTimes.filter((t) => t > cutoff);
  }
}

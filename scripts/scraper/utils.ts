import { NavigationError, errorMessage } from './errors';
import { log } from './logger';
import type { Clock, PageDriver } from './types';

export const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export const randomBetween = (min: number, max: number, random: () => number = Math.random): number =>
  min + (max - min) * random();

/** Drops query string and fragment (tracking parameters) from a detail URL. */
export const stripTracking = (url: string): string => url.split('#')[0].split('?')[0];

export const listingIdFromUrl = (url: string): string => {
  const match = url.match(/MLC-?(\d+)/i);
  return match ? match[1] : '';
};

export type NavigateOptions = {
  timeoutMs: number;
  relaxedTimeoutMs: number;
  /** Total attempts; the first uses domcontentloaded, the rest the relaxed policy. */
  attempts: number;
  /** Awaited before every retry, so each one takes its own paced turn. */
  beforeRetry?: () => Promise<void>;
};

/**
 * Navigates with one strict attempt followed by relaxed retries.
 * Throws the last NavigationError when every attempt fails.
 */
export async function goto<E>(page: PageDriver<E>, url: string, opts: NavigateOptions): Promise<void> {
  let lastError: unknown = null;
  for (let attempt = 1; attempt <= Math.max(1, opts.attempts); attempt++) {
    const relaxed = attempt > 1;
    if (relaxed && opts.beforeRetry) await opts.beforeRetry();
    try {
      await page.navigate(url, relaxed ? 'load' : 'domcontentloaded', relaxed ? opts.relaxedTimeoutMs : opts.timeoutMs);
      return;
    } catch (err) {
      lastError = err;
      log(`⚠️ Navigation attempt ${attempt} failed for ${url}: ${errorMessage(err)}`);
    }
  }
  if (lastError instanceof NavigationError) throw lastError;
  throw new NavigationError(url, 'network', lastError);
}

import 'dotenv/config';
import * as path from 'path';
import { ConfigError } from './errors';
import type { ScrapeConfig } from './types';

export const envStr = (v: string | undefined, fallback: string): string =>
  v === undefined || v.trim() === '' ? fallback : v.trim();

export const envInt = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
};

export const envFloat = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

export const envBool = (v: string | undefined, fallback: boolean): boolean => {
  if (v === undefined || v === '') return fallback;
  if (v === 'true' || v === '1') return true;
  if (v === 'false' || v === '0') return false;
  return fallback;
};

export const DEFAULT_CONFIG: ScrapeConfig = {
  searchUrl: envStr(
    process.env.SCRAPER_URL,
    'https://www.portalinmobiliario.com/venta/departamento/las-condes-metropolitana'
  ),

  minDelayMs: envInt(process.env.MIN_DELAY_MS, 3000),
  maxDelayMs: envInt(process.env.MAX_DELAY_MS, 8000),
  maxRequestsPerMinute: envInt(process.env.MAX_REQUESTS_PER_MINUTE, 10),

  avoidPeakHours: envBool(process.env.AVOID_PEAK_HOURS, true),
  peakStartHour: envInt(process.env.PEAK_START_HOUR, 9),
  peakEndHour: envInt(process.env.PEAK_END_HOUR, 18),

  maxListingsPerSession: envInt(process.env.SCRAPER_LIMIT, 100),
  maxPagesPerSession: envInt(process.env.SCRAPER_PAGE_LIMIT, 10),
  maxRetriesPerListing: envInt(process.env.MAX_RETRIES_PER_LISTING, 3),

  saveImages: envBool(process.env.SAVE_IMAGES, false),
  extractCoordinates: envBool(process.env.EXTRACT_COORDINATES, true),
  validateData: envBool(process.env.VALIDATE_DATA, true),
  usePersistentStore: envBool(process.env.USE_PERSISTENT_STORE, true),

  batchSaveSize: envInt(process.env.BATCH_SAVE_SIZE, 50),
  mongoUri: envStr(process.env.MONGODB_URI, 'mongodb://localhost:27017'),
  mongoDatabase: envStr(process.env.MONGODB_DATABASE, 'listings'),

  navTimeoutMs: envInt(process.env.NAV_TIMEOUT_MS, 30000),
  relaxedNavTimeoutMs: envInt(process.env.RELAXED_NAV_TIMEOUT_MS, 60000),
  pageWaitMs: envInt(process.env.PAGE_WAIT_MS, 3000),
  pageSize: envInt(process.env.PAGE_SIZE, 48),
  minCardsPerPage: envInt(process.env.MIN_CARDS_PER_PAGE, 5),
  paginationJitterMs: [
    envInt(process.env.PAGE_JITTER_MIN_MS, 2000),
    envInt(process.env.PAGE_JITTER_MAX_MS, 5000),
  ],
  maxFailureRate: envFloat(process.env.MAX_FAILURE_RATE, 0.3),

  headless: envBool(process.env.HEADLESS, true),
  outputDir: envStr(process.env.OUTPUT_DIR, path.join(__dirname, 'output')),
  exportJson: 'detailed_properties_complete.json',
  exportZip: 'detailed_properties_complete.zip',
  skipPreviouslyScraped: envBool(process.env.SKIP_PREVIOUSLY_SCRAPED, false),
};

const isHour = (h: number) => Number.isInteger(h) && h >= 0 && h <= 23;

export function createConfig(overrides: Partial<ScrapeConfig> = {}): Readonly<ScrapeConfig> {
  const config: ScrapeConfig = { ...DEFAULT_CONFIG, ...overrides };

  if (config.minDelayMs < 0 || config.minDelayMs > config.maxDelayMs) {
    throw new ConfigError(`minDelayMs (${config.minDelayMs}) must be between 0 and maxDelayMs (${config.maxDelayMs})`);
  }
  if (config.maxRequestsPerMinute < 1) {
    throw new ConfigError('maxRequestsPerMinute must be at least 1');
  }
  if (!isHour(config.peakStartHour) || !isHour(config.peakEndHour)) {
    throw new ConfigError('peak hours must be whole hours between 0 and 23');
  }
  if (config.batchSaveSize < 1) {
    throw new ConfigError('batchSaveSize must be at least 1');
  }
  if (config.maxRetriesPerListing < 1) {
    throw new ConfigError('maxRetriesPerListing must be at least 1');
  }
  const [jitterMin, jitterMax] = config.paginationJitterMs;
  if (jitterMin < 0 || jitterMin > jitterMax) {
    throw new ConfigError('paginationJitterMs must be an ascending, non-negative range');
  }

  const frozen: ScrapeConfig = { ...config, paginationJitterMs: [jitterMin, jitterMax] };
  return Object.freeze(frozen);
}

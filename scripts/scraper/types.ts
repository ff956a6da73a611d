// scripts/scraper/types.ts

export type WaitPolicy = 'domcontentloaded' | 'load';

/**
 * The slice of a browser page the crawler needs. `E` is the element handle
 * type of the underlying automation library.
 */
export interface PageDriver<E> {
  navigate(url: string, waitPolicy: WaitPolicy, timeoutMs: number): Promise<void>;
  /** Elements matching `selector`, scoped to `within` when given. */
  queryAll(selector: string, within?: E): Promise<E[]>;
  text(el: E): Promise<string>;
  attr(el: E, name: string): Promise<string | null>;
  /** Raw HTML of the current document. */
  content(): Promise<string>;
  /** Rendered text of the document body. */
  bodyText(): Promise<string>;
}

export type BrowserSession<E> = {
  page: PageDriver<E>;
  close(): Promise<void>;
};

export type SessionFactory<E> = () => Promise<BrowserSession<E>>;

export type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

export type ListingReference = {
  title?: string;
  rawPriceText?: string;
  detailUrl?: string;
  sourceSelector: string;
  pageIndex: number;
};

export type Currency = 'UF' | 'CLP';

export type PropertyRecord = {
  listingId: string;
  title: string;
  url: string;

  price: string;
  priceUf: number | null;
  priceClp: number | null;
  currency: Currency | null;
  maintenanceFee: string | null;

  bedrooms: number | null;
  bathrooms: number | null;
  totalAreaM2: number | null;
  builtAreaM2: number | null;
  parkingSpots: number | null;

  address: string | null;
  neighborhood: string | null;
  comuna: string | null;
  latitude: number | null;
  longitude: number | null;
  floorNumber: number | null;

  buildingAgeYears: number | null;
  totalFloors: number | null;
  hasElevator: boolean | null;
  orientation: string | null;

  amenityList: string[];
  hasPool: boolean | null;
  hasGym: boolean | null;
  hasSecurity: boolean | null;

  imageUrls: string[];
  videoUrl: string | null;

  listingDateText: string | null;
  daysOnMarket: number | null;
  agentInfo: string | null;
  scrapedAt: string;
};

export type ValidationResult = {
  score: number;
  maxScore: number;
  completenessPercentage: number;
  issues: string[];
  isValid: boolean;
};

export type ScrapeConfig = {
  searchUrl: string;

  minDelayMs: number;
  maxDelayMs: number;
  maxRequestsPerMinute: number;

  avoidPeakHours: boolean;
  peakStartHour: number;
  peakEndHour: number;

  maxListingsPerSession: number;
  maxPagesPerSession: number;
  maxRetriesPerListing: number;

  saveImages: boolean;
  extractCoordinates: boolean;
  validateData: boolean;
  usePersistentStore: boolean;

  batchSaveSize: number;
  mongoUri: string;
  mongoDatabase: string;

  navTimeoutMs: number;
  relaxedNavTimeoutMs: number;
  pageWaitMs: number;
  pageSize: number;
  minCardsPerPage: number;
  paginationJitterMs: [number, number];
  maxFailureRate: number;

  headless: boolean;
  outputDir: string;
  exportJson: string;
  exportZip: string;
  skipPreviouslyScraped: boolean;
};

export type DiscoveryStopReason =
  | 'no-next-page'
  | 'page-cap'
  | 'listing-cap'
  | 'navigation-failed'
  | 'no-cards'
  | 'blocked';

export type DiscoveryResult = {
  references: ListingReference[];
  pagesVisited: number;
  stopReason: DiscoveryStopReason;
  blockingKeywords: string[];
  diagnosticFile: string | null;
};

export type EnrichmentOutcome = {
  index: number;
  reference: ListingReference;
  record: PropertyRecord | null;
  error: string | null;
};

export type StoreStats = {
  totalCount: number;
  fieldCoverageCounts: {
    priceUf: number;
    bedrooms: number;
    totalAreaM2: number;
  };
  averages: {
    priceUf: number | null;
    totalAreaM2: number | null;
  };
  recentCount: number;
  completenessRate: {
    priceUf: number;
    bedrooms: number;
    totalAreaM2: number;
  };
};

/** Writes the file artifacts of a run. */
export interface ResultFiles {
  saveBatch(records: PropertyRecord[], at: Date): Promise<string>;
  saveExport(records: PropertyRecord[]): Promise<string>;
  saveDiagnostic(fileName: string, content: string): Promise<string>;
  loadPreviousListingIds(): Promise<Set<string>>;
}

export type RunSummary = {
  discovery: DiscoveryResult;
  records: PropertyRecord[];
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  circuitOpen: boolean;
  persistenceFailures: number;
  batchFiles: string[];
  exportFile: string | null;
};

// In-process stand-ins for the browser and the clock, shared by the tests.

import { createConfig } from './config';
import { NavigationError } from './errors';
import type { BrowserSession, Clock, PageDriver, ScrapeConfig, WaitPolicy } from './types';

export const SEARCH_URL = 'https://www.portalinmobiliario.com/venta/departamento/las-condes-metropolitana';

/** Fixed settings independent of the environment. */
export const testConfig = (overrides: Partial<ScrapeConfig> = {}): Readonly<ScrapeConfig> =>
  createConfig({
    searchUrl: SEARCH_URL,
    minDelayMs: 0,
    maxDelayMs: 0,
    maxRequestsPerMinute: 1000,
    avoidPeakHours: false,
    maxListingsPerSession: 100,
    maxPagesPerSession: 10,
    maxRetriesPerListing: 3,
    saveImages: false,
    extractCoordinates: true,
    validateData: true,
    usePersistentStore: false,
    batchSaveSize: 50,
    navTimeoutMs: 30000,
    relaxedNavTimeoutMs: 60000,
    pageWaitMs: 3000,
    pageSize: 48,
    minCardsPerPage: 5,
    paginationJitterMs: [2000, 5000],
    maxFailureRate: 0.3,
    skipPreviouslyScraped: false,
    ...overrides,
  });

/** A search-result card with a title and a detail link. */
export const listingCard = (id: number): FakeElement => ({
  children: {
    '.poly-component__title': [{ text: `Departamento número ${id} en venta` }],
    'a[href*="MLC"]': [{ attrs: { href: `https://www.portalinmobiliario.com/MLC-${id}-departamento` } }],
  },
});

export type FakeElement = {
  text?: string;
  attrs?: Record<string, string>;
  children?: Record<string, FakeElement[]>;
};

export type FakePageContent = {
  elements?: Record<string, FakeElement[]>;
  html?: string;
  body?: string;
};

export type Navigation = { url: string; waitPolicy: WaitPolicy; timeoutMs: number };

/** Serves canned documents by URL; unknown URLs load an empty page. */
export class FakePage implements PageDriver<FakeElement> {
  readonly navigations: Navigation[] = [];
  private current: FakePageContent = {};
  private readonly failures = new Map<string, number>();

  constructor(private readonly pages: Record<string, FakePageContent> = {}) {}

  /** The next `times` navigations to `url` time out. */
  failNavigation(url: string, times = Number.POSITIVE_INFINITY): this {
    this.failures.set(url, times);
    return this;
  }

  async navigate(url: string, waitPolicy: WaitPolicy, timeoutMs: number): Promise<void> {
    this.navigations.push({ url, waitPolicy, timeoutMs });
    const remaining = this.failures.get(url) ?? 0;
    if (remaining > 0) {
      this.failures.set(url, remaining - 1);
      throw new NavigationError(url, 'timeout');
    }
    this.current = this.pages[url] ?? {};
  }

  async queryAll(selector: string, within?: FakeElement): Promise<FakeElement[]> {
    const scope = within ? within.children : this.current.elements;
    return scope?.[selector] ?? [];
  }

  async text(el: FakeElement): Promise<string> {
    return el.text ?? '';
  }

  async attr(el: FakeElement, name: string): Promise<string | null> {
    return el.attrs?.[name] ?? null;
  }

  async content(): Promise<string> {
    return this.current.html ?? '';
  }

  async bodyText(): Promise<string> {
    return this.current.body ?? '';
  }

  get visited(): string[] {
    return this.navigations.map((n) => n.url);
  }
}

export type FakeSessionFactory = {
  (): Promise<BrowserSession<FakeElement>>;
  opened: number;
  closed: number;
};

export function fakeSessions(page: FakePage): FakeSessionFactory {
  const factory: FakeSessionFactory = Object.assign(
    async () => {
      factory.opened++;
      return {
        page,
        close: async () => {
          factory.closed++;
        },
      };
    },
    { opened: 0, closed: 0 }
  );
  return factory;
}

/** A clock whose `sleep` advances time instantly and records each wait. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

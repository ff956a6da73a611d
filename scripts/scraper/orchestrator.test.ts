import { describe, expect, it } from 'vitest';
import { CrawlOrchestrator, failureRateExceeded } from './orchestrator';
import { MemoryPropertyStore } from './persistence';
import type { PersistenceGateway } from './persistence';
import { FakeClock, FakePage, SEARCH_URL, fakeSessions, listingCard, testConfig } from './testing';
import type { FakePageContent } from './testing';
import type { PropertyRecord, ResultFiles, ScrapeConfig, StoreStats } from './types';

const detailUrl = (id: number) => `https://www.portalinmobiliario.com/MLC-${id}-departamento`;
const ids = (count: number) => Array.from({ length: count }, (_, i) => i + 1);

class MemoryFiles implements ResultFiles {
  readonly batches: PropertyRecord[][] = [];
  exported: PropertyRecord[] | null = null;

  constructor(private readonly previous: Set<string> = new Set()) {}

  async saveBatch(records: PropertyRecord[]): Promise<string> {
    this.batches.push([...records]);
    return `batch_${this.batches.length}.json`;
  }

  async saveExport(records: PropertyRecord[]): Promise<string> {
    this.exported = [...records];
    return 'export.json';
  }

  async saveDiagnostic(fileName: string): Promise<string> {
    return fileName;
  }

  async loadPreviousListingIds(): Promise<Set<string>> {
    return this.previous;
  }
}

class FailingStore implements PersistenceGateway {
  async upsert(): Promise<void> {
    throw new Error('store offline');
  }

  async aggregateStats(): Promise<StoreStats> {
    throw new Error('store offline');
  }

  async close(): Promise<void> {}
}

/** A site with one results page of `count` listings, each with its own detail page. */
function site(count: number): FakePage {
  const pages: Record<string, FakePageContent> = {
    [SEARCH_URL]: { elements: { '.ui-search-layout__item': ids(count).map(listingCard) } },
  };
  for (const id of ids(count)) {
    pages[detailUrl(id)] = {
      elements: { '.ui-pdp-price__second-line': [{ text: `UF ${id}.000` }] },
      body: `${id} dormitorios 80 m² totales`,
    };
  }
  return new FakePage(pages);
}

function setup(page: FakePage, options: { config?: Partial<ScrapeConfig>; files?: MemoryFiles; store?: PersistenceGateway } = {}) {
  const sessions = fakeSessions(page);
  const files = options.files ?? new MemoryFiles();
  const orchestrator = new CrawlOrchestrator({
    config: testConfig(options.config),
    openSession: sessions,
    files,
    store: options.store,
    clock: new FakeClock(Date.parse('2024-05-01T12:00:00.000Z')),
    random: () => 0,
  });
  return { orchestrator, files, sessions };
}

const visitedDetail = (page: FakePage, id: number) => page.visited.includes(detailUrl(id));

describe('failureRateExceeded', () => {
  it('trips only above the threshold', () => {
    expect(failureRateExceeded(0, 0, 0.3)).toBe(false);
    expect(failureRateExceeded(3, 10, 0.3)).toBe(false);
    expect(failureRateExceeded(4, 10, 0.3)).toBe(true);
  });
});

describe('CrawlOrchestrator', () => {
  it('runs discovery, enrichment and export in order', async () => {
    const page = site(6);
    const { orchestrator, files, sessions } = setup(page);

    const summary = await orchestrator.run();

    expect(summary.discovery.stopReason).toBe('no-next-page');
    expect(summary).toMatchObject({ attempted: 6, succeeded: 6, failed: 0, skipped: 0, circuitOpen: false });
    expect(summary.records.map((r) => r.listingId)).toEqual(['1', '2', '3', '4', '5', '6']);
    expect(summary.records[2]).toMatchObject({ priceUf: 3000, bedrooms: 3, totalAreaM2: 80 });
    expect(summary.exportFile).toBe('export.json');
    expect(files.exported).toHaveLength(6);
    expect(sessions.opened).toBe(2);
    expect(sessions.closed).toBe(2);
  });

  it('opens the circuit once failures exceed the threshold and keeps partial results', async () => {
    const page = site(10);
    for (const id of [6, 7, 8]) page.failNavigation(detailUrl(id));
    const { orchestrator, files } = setup(page);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ attempted: 8, succeeded: 5, failed: 3, circuitOpen: true });
    expect(summary.records.map((r) => r.listingId)).toEqual(['1', '2', '3', '4', '5']);
    expect(visitedDetail(page, 9)).toBe(false);
    expect(visitedDetail(page, 10)).toBe(false);
    expect(files.batches.map((b) => b.length)).toEqual([5]);
    expect(files.exported).toHaveLength(5);
  });

  it('stops before the remaining references when half of the attempts fail', async () => {
    const page = site(10);
    for (const id of [5, 6, 7, 8]) page.failNavigation(detailUrl(id));
    const { orchestrator } = setup(page);

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ attempted: 6, succeeded: 4, failed: 2, circuitOpen: true });
    expect(visitedDetail(page, 7)).toBe(false);
    expect(visitedDetail(page, 9)).toBe(false);
    expect(visitedDetail(page, 10)).toBe(false);
  });

  it('flushes a batch on every batchSaveSize-th success and the remainder at the end', async () => {
    const { orchestrator, files } = setup(site(7), { config: { batchSaveSize: 3 } });

    const summary = await orchestrator.run();

    expect(files.batches.map((b) => b.map((r) => r.listingId))).toEqual([['1', '2', '3'], ['4', '5', '6'], ['7']]);
    expect(summary.batchFiles).toEqual(['batch_1.json', 'batch_2.json', 'batch_3.json']);
  });

  it('upserts every accepted record into the store', async () => {
    const store = new MemoryPropertyStore();
    const { orchestrator } = setup(site(6), { store });

    await orchestrator.run();
    await orchestrator.run();

    expect(store.rows().map((r) => r.listingId)).toEqual(['1', '2', '3', '4', '5', '6']);
  });

  it('keeps going when the store rejects writes', async () => {
    const { orchestrator, files } = setup(site(6), { store: new FailingStore() });

    const summary = await orchestrator.run();

    expect(summary.succeeded).toBe(6);
    expect(summary.persistenceFailures).toBe(6);
    expect(files.exported).toHaveLength(6);
  });

  it('skips listings found in a previous export', async () => {
    const page = site(6);
    const { orchestrator } = setup(page, {
      config: { skipPreviouslyScraped: true },
      files: new MemoryFiles(new Set(['1', '2'])),
    });

    const summary = await orchestrator.run();

    expect(summary).toMatchObject({ attempted: 4, skipped: 2 });
    expect(visitedDetail(page, 1)).toBe(false);
  });

  it('limits enrichment to maxListingsPerSession', async () => {
    const { orchestrator } = setup(site(8), { config: { maxListingsPerSession: 3 } });

    const summary = await orchestrator.run();

    expect(summary.discovery.stopReason).toBe('listing-cap');
    expect(summary.discovery.references).toHaveLength(8);
    expect(summary.attempted).toBe(3);
  });

  it('returns an empty summary when the browser cannot be launched', async () => {
    const files = new MemoryFiles();
    const orchestrator = new CrawlOrchestrator({
      config: testConfig(),
      openSession: async () => {
        throw new Error('no browser');
      },
      files,
      clock: new FakeClock(),
    });

    const summary = await orchestrator.run();

    expect(summary.discovery.stopReason).toBe('navigation-failed');
    expect(summary).toMatchObject({ attempted: 0, succeeded: 0, exportFile: null, batchFiles: [] });
    expect(files.exported).toBeNull();
  });
});

import { errorMessage } from './errors';
import {
  DetailContext,
  DetailPatch,
  extractAmenities,
  extractBuilding,
  extractFinancial,
  extractLocation,
  extractMedia,
  extractMetadata,
  extractPhysical,
} from './extractor';
import { log, warn } from './logger';
import { parsePrice } from './parsing';
import { applyPatch, createRecord } from './record';
import { goto, listingIdFromUrl, stripTracking, systemClock } from './utils';
import type {
  Clock,
  EnrichmentOutcome,
  ListingReference,
  PageDriver,
  PropertyRecord,
  ScrapeConfig,
  SessionFactory,
} from './types';

export type EnricherDeps<E> = {
  config: Readonly<ScrapeConfig>;
  scheduler: { awaitTurn(): Promise<void> };
  openSession: SessionFactory<E>;
  clock?: Clock;
};

type Pass<E> = { name: string; run: (ctx: DetailContext<E>) => Promise<DetailPatch> };

/**
 * Visits the detail page of each listing reference and extracts the full
 * field set. Owns one browser session for the whole phase.
 */
export class DetailEnricher<E> {
  private readonly clock: Clock;

  constructor(private readonly deps: EnricherDeps<E>) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Yields one outcome per reference, in order. The browser session is
   * closed when the iteration completes or the consumer stops early.
   */
  async *enrich(references: readonly ListingReference[]): AsyncGenerator<EnrichmentOutcome, void, undefined> {
    const session = await this.deps.openSession();
    try {
      for (const [index, reference] of references.entries()) {
        yield await this.attempt(session.page, index, reference, references.length);
      }
    } finally {
      await session.close();
      log('🔒 Detail browser session closed.');
    }
  }

  private async attempt(
    page: PageDriver<E>,
    index: number,
    reference: ListingReference,
    total: number
  ): Promise<EnrichmentOutcome> {
    if (!reference.detailUrl) {
      warn(`⚠️ Listing ${index + 1}: no detail URL found`);
      return { index, reference, record: null, error: 'missing detail URL' };
    }

    const url = stripTracking(reference.detailUrl);
    log(`🏠 Scraping ${index + 1}/${total}: ${(reference.title ?? url).slice(0, 50)}`);
    await this.deps.scheduler.awaitTurn();

    try {
      const record = await this.scrapeDetail(page, url, reference);
      return { index, reference, record, error: null };
    } catch (err) {
      warn(`❌ Error scraping listing ${index + 1}: ${errorMessage(err).slice(0, 100)}`);
      return { index, reference, record: null, error: errorMessage(err) };
    }
  }

  /** Navigates to `url` and runs every extraction pass; a failing pass leaves its fields unset. */
  async scrapeDetail(page: PageDriver<E>, url: string, reference: ListingReference): Promise<PropertyRecord> {
    const { config } = this.deps;
    await goto(page, url, {
      timeoutMs: config.navTimeoutMs,
      relaxedTimeoutMs: config.relaxedNavTimeoutMs,
      attempts: config.maxRetriesPerListing,
      beforeRetry: () => this.deps.scheduler.awaitTurn(),
    });
    await this.clock.sleep(config.pageWaitMs);

    const scrapedAt = new Date(this.clock.now());
    let record = createRecord({
      listingId: listingIdFromUrl(url),
      title: reference.title ?? '',
      url,
      scrapedAt: scrapedAt.toISOString(),
    });

    let body: Promise<string> | null = null;
    const ctx: DetailContext<E> = {
      page,
      bodyText: () => (body ??= page.bodyText()),
      title: record.title,
      currentYear: scrapedAt.getFullYear(),
    };

    for (const pass of this.passes()) {
      try {
        record = applyPatch(record, await pass.run(ctx));
      } catch (err) {
        warn(`⚠️ Error extracting ${pass.name} data: ${errorMessage(err)}`);
      }
    }

    if (record.price === '' && reference.rawPriceText) {
      record = applyPatch(record, { price: reference.rawPriceText, ...parsePrice(reference.rawPriceText) });
    }
    return record;
  }

  private passes(): Pass<E>[] {
    const { config } = this.deps;
    const passes: Pass<E>[] = [
      { name: 'financial', run: extractFinancial },
      { name: 'physical', run: extractPhysical },
      { name: 'location', run: (ctx) => extractLocation(ctx, { extractCoordinates: config.extractCoordinates }) },
      { name: 'building', run: extractBuilding },
      { name: 'amenities', run: extractAmenities },
    ];
    if (config.saveImages) passes.push({ name: 'media', run: extractMedia });
    passes.push({ name: 'metadata', run: extractMetadata });
    return passes;
  }
}

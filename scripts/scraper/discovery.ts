import { errorMessage } from './errors';
import { SELECTORS, extractCard, hasNextPage } from './extractor';
import { log, warn } from './logger';
import { goto, randomBetween, systemClock } from './utils';
import type {
  Clock,
  DiscoveryResult,
  DiscoveryStopReason,
  ListingReference,
  PageDriver,
  ResultFiles,
  ScrapeConfig,
} from './types';

/** Words that suggest a challenge or block page instead of results. */
export const BLOCKING_KEYWORDS = [
  'captcha',
  'blocked',
  'security',
  'challenge',
  'robot',
  'automation',
  'bot',
  'unusual traffic',
  'acceso denegado',
];

export function findBlockingKeywords(html: string): string[] {
  const lower = html.toLowerCase();
  return BLOCKING_KEYWORDS.filter((keyword) => new RegExp(`\\b${keyword}\\b`).test(lower));
}

/** Search URL of page `pageIndex` (1-based); the site addresses pages by item offset. */
export function pageUrl(searchUrl: string, pageIndex: number, pageSize: number): string {
  if (pageIndex <= 1) return searchUrl;
  const offset = (pageIndex - 1) * pageSize;
  return `${searchUrl.replace(/\/+$/, '')}/_Desde_${offset + 1}`;
}

export type DiscoveryDeps = {
  config: Readonly<ScrapeConfig>;
  scheduler: { awaitTurn(): Promise<void> };
  files: Pick<ResultFiles, 'saveDiagnostic'>;
  clock?: Clock;
  random?: () => number;
};

type CardMatch<E> = { selector: string; elements: E[] };

/**
 * Walks the paginated search results and collects listing references.
 * Never throws: every stop condition ends the walk with what was collected.
 */
export class ListingDiscovery {
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(private readonly deps: DiscoveryDeps) {
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  async discover<E>(page: PageDriver<E>, searchUrl: string = this.deps.config.searchUrl): Promise<DiscoveryResult> {
    const { config, scheduler } = this.deps;
    const references: ListingReference[] = [];
    let pagesVisited = 0;

    const done = (stopReason: DiscoveryStopReason, blockingKeywords: string[] = [], diagnosticFile: string | null = null) => {
      log(`📋 Discovery finished (${stopReason}): ${references.length} listings over ${pagesVisited} page(s).`);
      return { references, pagesVisited, stopReason, blockingKeywords, diagnosticFile };
    };

    for (let pageIndex = 1; ; pageIndex++) {
      const url = pageUrl(searchUrl, pageIndex, config.pageSize);
      log(`Scraping page ${pageIndex}: ${url}`);

      await scheduler.awaitTurn();
      try {
        await goto(page, url, {
          timeoutMs: config.navTimeoutMs,
          relaxedTimeoutMs: config.relaxedNavTimeoutMs,
          attempts: 2,
          beforeRetry: () => scheduler.awaitTurn(),
        });
      } catch (err) {
        warn(`❌ Could not load page ${pageIndex}: ${errorMessage(err)}`);
        return done('navigation-failed');
      }
      pagesVisited++;
      await this.clock.sleep(config.pageWaitMs);

      const cards = await this.findCards(page);
      if (!cards) {
        warn(`❌ No listing cards on page ${pageIndex}, checking for a blocking page.`);
        return this.inspectBlocking(page, pageIndex, done);
      }
      log(`✅ Using selector ${cards.selector} (${cards.elements.length} elements)`);

      let added = 0;
      for (const card of cards.elements) {
        try {
          const reference = await extractCard(page, card, { sourceSelector: cards.selector, pageIndex, baseUrl: url });
          if (reference) {
            references.push(reference);
            added++;
          }
        } catch (err) {
          warn(`Card on page ${pageIndex} skipped: ${errorMessage(err)}`);
        }
      }
      log(`Found ${added} listings on page ${pageIndex} (${references.length} total).`);

      if (references.length >= config.maxListingsPerSession) return done('listing-cap');
      if (pageIndex >= config.maxPagesPerSession) return done('page-cap');
      if (!(await this.nextPageAvailable(page))) return done('no-next-page');

      const [jitterMin, jitterMax] = config.paginationJitterMs;
      await this.clock.sleep(randomBetween(jitterMin, jitterMax, this.random));
    }
  }

  private async findCards<E>(page: PageDriver<E>): Promise<CardMatch<E> | null> {
    for (const selector of SELECTORS.cards) {
      try {
        const elements = await page.queryAll(selector);
        if (elements.length > this.deps.config.minCardsPerPage) return { selector, elements };
      } catch (err) {
        warn(`Card selector ${selector} failed: ${errorMessage(err)}`);
      }
    }
    return null;
  }

  private async nextPageAvailable<E>(page: PageDriver<E>): Promise<boolean> {
    try {
      return await hasNextPage(page);
    } catch (err) {
      warn(`Pagination check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async inspectBlocking<E>(
    page: PageDriver<E>,
    pageIndex: number,
    done: (reason: DiscoveryStopReason, keywords?: string[], file?: string | null) => DiscoveryResult
  ): Promise<DiscoveryResult> {
    let keywords: string[] = [];
    let diagnosticFile: string | null = null;
    try {
      const html = await page.content();
      keywords = findBlockingKeywords(html);
      for (const keyword of keywords) warn(`⚠️ Possible blocking detected: ${keyword}`);
      diagnosticFile = await this.deps.files.saveDiagnostic(`debug_page_${pageIndex}.html`, html);
      log(`Page content saved to ${diagnosticFile}`);
    } catch (err) {
      warn(`Could not capture diagnostic content: ${errorMessage(err)}`);
    }
    return done(keywords.length > 0 ? 'blocked' : 'no-cards', keywords, diagnosticFile);
  }
}

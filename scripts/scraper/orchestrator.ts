import { ListingDiscovery } from './discovery';
import { DetailEnricher } from './enricher';
import { errorMessage } from './errors';
import { log, warn, error } from './logger';
import { PacingScheduler } from './pacing';
import { MemoryPropertyStore, PersistenceGateway } from './persistence';
import { listingIdFromUrl, systemClock } from './utils';
import { clean, score } from './validation';
import type {
  Clock,
  DiscoveryResult,
  ListingReference,
  PropertyRecord,
  ResultFiles,
  RunSummary,
  ScrapeConfig,
  SessionFactory,
} from './types';

export type OrchestratorDeps<E> = {
  config: Readonly<ScrapeConfig>;
  openSession: SessionFactory<E>;
  files: ResultFiles;
  /** Omitted when the persistent store is disabled; rows are then kept in memory. */
  store?: PersistenceGateway;
  clock?: Clock;
  random?: () => number;
  scheduler?: PacingScheduler;
};

/** True once the share of failed attempts exceeds `maxRate`. */
export const failureRateExceeded = (failed: number, attempted: number, maxRate: number): boolean =>
  attempted > 0 && failed / attempted > maxRate;

/**
 * Runs one crawl: discovery, detail enrichment, cleaning and persistence,
 * strictly in sequence. Every result list of a run lives on the instance.
 */
export class CrawlOrchestrator<E> {
  readonly scheduler: PacingScheduler;
  readonly store: PersistenceGateway;
  private readonly clock: Clock;

  private records: PropertyRecord[] = [];
  private batchFiles: string[] = [];
  private persistenceFailures = 0;

  constructor(private readonly deps: OrchestratorDeps<E>) {
    this.clock = deps.clock ?? systemClock;
    this.scheduler = deps.scheduler ?? new PacingScheduler(deps.config, this.clock, deps.random);
    this.store = deps.store ?? new MemoryPropertyStore(() => this.clock.now());
  }

  async run(searchUrl: string = this.deps.config.searchUrl): Promise<RunSummary> {
    this.records = [];
    this.batchFiles = [];
    this.persistenceFailures = 0;

    log('🚀 Phase 1: collecting listing references...');
    const discovery = await this.discover(searchUrl);

    const { references, skipped } = await this.selectReferences(discovery.references);
    log(`🔍 Phase 2: extracting details from ${references.length} listings...`);

    const { attempted, failed, circuitOpen } =
      references.length > 0 ? await this.enrichAll(references) : { attempted: 0, failed: 0, circuitOpen: false };
    const exportFile = await this.export();

    const summary: RunSummary = {
      discovery,
      records: [...this.records],
      attempted,
      succeeded: this.records.length,
      failed,
      skipped,
      circuitOpen,
      persistenceFailures: this.persistenceFailures,
      batchFiles: [...this.batchFiles],
      exportFile,
    };
    log(`✅ Run finished: ${summary.succeeded}/${attempted} succeeded, ${failed} failed.`);
    return summary;
  }

  private async discover(searchUrl: string): Promise<DiscoveryResult> {
    const discovery = new ListingDiscovery({
      config: this.deps.config,
      scheduler: this.scheduler,
      files: this.deps.files,
      clock: this.clock,
      random: this.deps.random,
    });
    const session = await this.deps.openSession().catch((err: unknown) => {
      error(`Failed to launch browser: ${errorMessage(err)}`);
      return null;
    });
    if (!session) {
      return { references: [], pagesVisited: 0, stopReason: 'navigation-failed', blockingKeywords: [], diagnosticFile: null };
    }
    try {
      return await discovery.discover(session.page, searchUrl);
    } finally {
      await session.close();
    }
  }

  private async enrichAll(references: ListingReference[]): Promise<{ attempted: number; failed: number; circuitOpen: boolean }> {
    const { config } = this.deps;
    let attempted = 0;
    let failed = 0;
    let circuitOpen = false;
    let pending: PropertyRecord[] = [];

    const enricher = new DetailEnricher<E>({
      config,
      scheduler: this.scheduler,
      openSession: this.deps.openSession,
      clock: this.clock,
    });

    try {
      for await (const outcome of enricher.enrich(references)) {
        attempted++;
        if (outcome.record) {
          pending.push(await this.accept(outcome.record));
          if (pending.length === config.batchSaveSize) {
            await this.flush(pending);
            pending = [];
          }
        } else {
          failed++;
        }

        if (attempted % 10 === 0) {
          const successRate = ((attempted - failed) / attempted) * 100;
          log(`📊 Progress: ${attempted}/${references.length} (${successRate.toFixed(1)}% success rate)`);
        }
        if (failureRateExceeded(failed, attempted, config.maxFailureRate)) {
          warn(`⚠️ High failure rate (${failed}/${attempted}). Possible blocking or site changes; stopping enrichment.`);
          circuitOpen = true;
          break;
        }
      }
    } catch (err) {
      error(`Detail enrichment aborted: ${errorMessage(err)}`);
    }

    if (pending.length > 0) await this.flush(pending);
    return { attempted, failed, circuitOpen };
  }

  private async selectReferences(found: ListingReference[]): Promise<{ references: ListingReference[]; skipped: number }> {
    const { config } = this.deps;
    let references = found;
    let skipped = 0;
    if (config.skipPreviouslyScraped) {
      const known = await this.deps.files.loadPreviousListingIds().catch((err: unknown) => {
        warn(`Could not read previous results: ${errorMessage(err)}`);
        return new Set<string>();
      });
      references = found.filter((ref) => {
        const id = ref.detailUrl ? listingIdFromUrl(ref.detailUrl) : '';
        const seen = id !== '' && known.has(id);
        if (seen) log(`🔄 Skipping previously scraped listing ${id}`);
        return !seen;
      });
      skipped = found.length - references.length;
    }
    if (references.length > config.maxListingsPerSession) {
      references = references.slice(0, config.maxListingsPerSession);
      log(`📊 Limited to ${references.length} listings for this session`);
    }
    return { references, skipped };
  }

  private async accept(raw: PropertyRecord): Promise<PropertyRecord> {
    let record = raw;
    if (this.deps.config.validateData) {
      record = clean(raw, (message) => warn(`⚠️ ${message}`));
      const validation = score(record);
      if (!validation.isValid) {
        warn(
          `⚠️ Property ${record.listingId || record.url} has low data quality (${validation.completenessPercentage.toFixed(1)}%)`
        );
        validation.issues.forEach((issue) => warn(`    - ${issue}`));
      }
    }
    this.records.push(record);
    try {
      await this.store.upsert(record);
    } catch (err) {
      this.persistenceFailures++;
      error(`❌ Persistence error: ${errorMessage(err)}`);
    }
    return record;
  }

  private async flush(batch: PropertyRecord[]): Promise<void> {
    try {
      this.batchFiles.push(await this.deps.files.saveBatch(batch, new Date(this.clock.now())));
    } catch (err) {
      this.persistenceFailures++;
      error(`❌ Could not write batch file: ${errorMessage(err)}`);
    }
  }

  private async export(): Promise<string | null> {
    if (this.records.length === 0) return null;
    try {
      return await this.deps.files.saveExport(this.records);
    } catch (err) {
      this.persistenceFailures++;
      error(`❌ Could not write export file: ${errorMessage(err)}`);
      return null;
    }
  }
}

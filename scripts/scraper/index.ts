import { launchSession } from './browser';
import { createConfig } from './config';
import { errorMessage } from './errors';
import { log, warn, error } from './logger';
import { CrawlOrchestrator } from './orchestrator';
import { MemoryPropertyStore, MongoPropertyStore } from './persistence';
import type { PersistenceGateway } from './persistence';
import { formatReport, summarizeRecords } from './report';
import { FileExporter } from './storage';
import type { ScrapeConfig } from './types';

async function openStore(config: Readonly<ScrapeConfig>): Promise<PersistenceGateway> {
  if (!config.usePersistentStore) return new MemoryPropertyStore();
  const mongo = new MongoPropertyStore(config.mongoUri, config.mongoDatabase);
  try {
    await mongo.connect();
    return mongo;
  } catch (err) {
    warn(`⚠️ ${errorMessage(err)}; keeping results in memory for this run.`);
    await mongo.close().catch((closeErr: unknown) => warn(`Could not close MongoDB client: ${errorMessage(closeErr)}`));
    return new MemoryPropertyStore();
  }
}

async function main(): Promise<void> {
  const config = createConfig();
  log('Starting scraper with config:', config);
  const store = await openStore(config);
  try {
    const orchestrator = new CrawlOrchestrator({
      config,
      openSession: () => launchSession(config),
      files: new FileExporter(config.outputDir, config.exportJson, config.exportZip),
      store,
    });
    const summary = await orchestrator.run();
    log(
      `Discovery visited ${summary.discovery.pagesVisited} pages, found ${summary.discovery.references.length} listings (${summary.discovery.stopReason}).`
    );
    if (summary.discovery.diagnosticFile) log(`Diagnostic page saved to ${summary.discovery.diagnosticFile}`);
    if (summary.circuitOpen) warn('⚠️ Enrichment stopped early because of the failure rate.');
    if (summary.exportFile) log(`JSON: ${summary.exportFile}`);

    const stats = await store.aggregateStats().catch((err: unknown) => {
      warn(`Could not compute store statistics: ${errorMessage(err)}`);
      return null;
    });
    formatReport(summarizeRecords(summary.records), stats).forEach((line) => log(line));
  } catch (err) {
    error('Scraper failed:', errorMessage(err));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

main().catch((err: unknown) => {
  error('Scraper failed to start:', errorMessage(err));
  process.exitCode = 1;
});

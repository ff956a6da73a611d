import * as fs from 'fs/promises';
import * as fss from 'fs';
import * as path from 'path';
import archiver from 'archiver';
import { log } from './logger';
import { listingIdFromUrl } from './utils';
import type { PropertyRecord, ResultFiles } from './types';

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** `YYYYMMDD_HHMMSS_mmm` in local time. */
export const fileStamp = (d: Date): string =>
  `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
  `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}_${pad(d.getMilliseconds(), 3)}`;

export async function saveResults(results: unknown[], outDir: string, jsonName: string): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, jsonName);
  await fs.writeFile(file, JSON.stringify(results), 'utf8');
  return file;
}

export async function zipFile(filePath: string, outDir: string, zipName: string): Promise<string> {
  const zipPath = path.join(outDir, zipName);
  const output = fss.createWriteStream(zipPath);
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    output.on('error', reject);
  });
  const archiveObj = archiver('zip', { zlib: { level: 9 } });
  archiveObj.pipe(output);
  archiveObj.file(filePath, { name: path.basename(filePath) });
  await archiveObj.finalize();
  await closed;
  return zipPath;
}

const hasUrl = (row: unknown): row is { url: string } =>
  typeof row === 'object' && row !== null && 'url' in row && typeof row.url === 'string';

const hasListingId = (row: unknown): row is { listingId: string } =>
  typeof row === 'object' && row !== null && 'listingId' in row && typeof row.listingId === 'string';

/** Listing ids found in a previous export (records or plain URLs). */
export async function loadPreviousListingIds(prevFile: string): Promise<Set<string>> {
  let raw: string;
  try {
    raw = await fs.readFile(prevFile, 'utf8');
  } catch {
    log('No previous results found (first run?). prevFile:', prevFile);
    return new Set<string>();
  }
  const data: unknown = JSON.parse(raw);
  const rows: unknown[] = Array.isArray(data) ? data : [];
  const ids = new Set<string>();
  for (const row of rows) {
    const id = hasListingId(row) ? row.listingId : typeof row === 'string' ? listingIdFromUrl(row) : hasUrl(row) ? listingIdFromUrl(row.url) : '';
    if (id) ids.add(id);
  }
  log(`Loaded ${ids.size} previous listing ids to skip.`);
  return ids;
}

/** Batch, export and diagnostic files under one output directory. */
export class FileExporter implements ResultFiles {
  constructor(
    private readonly outDir: string,
    private readonly exportJson: string,
    private readonly exportZip: string
  ) {}

  async saveBatch(records: PropertyRecord[], at: Date): Promise<string> {
    const file = await saveResults(records, this.outDir, `detailed_properties_batch_${fileStamp(at)}.json`);
    log(`💾 Saved batch of ${records.length} properties to ${file}`);
    return file;
  }

  async saveExport(records: PropertyRecord[]): Promise<string> {
    const file = await saveResults(records, this.outDir, this.exportJson);
    const zip = await zipFile(file, this.outDir, this.exportZip);
    log(`💾 Saved ${records.length} detailed properties to ${file} (zip: ${zip})`);
    return file;
  }

  async saveDiagnostic(fileName: string, content: string): Promise<string> {
    await fs.mkdir(this.outDir, { recursive: true });
    const file = path.join(this.outDir, fileName);
    await fs.writeFile(file, content, 'utf8');
    return file;
  }

  loadPreviousListingIds(): Promise<Set<string>> {
    return loadPreviousListingIds(path.join(this.outDir, this.exportJson));
  }
}

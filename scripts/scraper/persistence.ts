import { Collection, Document, MongoClient } from 'mongodb';
import { PersistenceError, errorMessage } from './errors';
import { log } from './logger';
import type { PropertyRecord, StoreStats } from './types';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface PersistenceGateway {
  /** Replaces the stored row with the same `listingId`; records without one are inserted. */
  upsert(record: PropertyRecord): Promise<void>;
  /** Counts, field coverage and averages; `recentCount` covers the last `windowMs`. */
  aggregateStats(windowMs?: number): Promise<StoreStats>;
  close(): Promise<void>;
}

/** Stored shape: list fields are kept as JSON text. */
export type PropertyDocument = Omit<PropertyRecord, 'amenityList' | 'imageUrls'> & {
  amenities: string;
  imageUrls: string;
};

export function toDocument(record: PropertyRecord): PropertyDocument {
  const { amenityList, imageUrls, ...rest } = record;
  return { ...rest, amenities: JSON.stringify(amenityList), imageUrls: JSON.stringify(imageUrls) };
}

const parseList = (json: string): string[] => {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
};

export function fromDocument(doc: PropertyDocument): PropertyRecord {
  const { amenities, imageUrls, ...rest } = doc;
  return { ...rest, amenityList: parseList(amenities), imageUrls: parseList(imageUrls) };
}

const round2 = (n: number) => Math.round(n * 100) / 100;
const rate = (part: number, total: number) => (total ? (part / total) * 100 : 0);

export function buildStats(
  totalCount: number,
  coverage: StoreStats['fieldCoverageCounts'],
  averages: { priceUf: number | null; totalAreaM2: number | null },
  recentCount: number
): StoreStats {
  return {
    totalCount,
    fieldCoverageCounts: coverage,
    averages: {
      priceUf: averages.priceUf === null ? null : round2(averages.priceUf),
      totalAreaM2: averages.totalAreaM2 === null ? null : round2(averages.totalAreaM2),
    },
    recentCount,
    completenessRate: {
      priceUf: rate(coverage.priceUf, totalCount),
      bedrooms: rate(coverage.bedrooms, totalCount),
      totalAreaM2: rate(coverage.totalAreaM2, totalCount),
    },
  };
}

const mean = (values: number[]): number | null =>
  values.length ? values.reduce((a, b) => a + b, 0) / values.length : null;

/** Keeps rows in memory; used when the persistent store is disabled and in tests. */
export class MemoryPropertyStore implements PersistenceGateway {
  private readonly byId = new Map<string, PropertyDocument>();
  private readonly anonymous: PropertyDocument[] = [];

  constructor(private readonly nowMs: () => number = Date.now) {}

  async upsert(record: PropertyRecord): Promise<void> {
    const doc = toDocument(record);
    if (record.listingId) this.byId.set(record.listingId, doc);
    else this.anonymous.push(doc);
  }

  /** Stored rows, keyed rows first in first-insert order. */
  rows(): PropertyRecord[] {
    return [...this.byId.values(), ...this.anonymous].map(fromDocument);
  }

  async aggregateStats(windowMs: number = DAY_MS): Promise<StoreStats> {
    const rows = this.rows();
    const since = this.nowMs() - windowMs;
    const prices = rows.map((r) => r.priceUf).filter((v): v is number => v !== null && v > 0);
    const areas = rows.map((r) => r.totalAreaM2).filter((v): v is number => v !== null && v > 0);
    return buildStats(
      rows.length,
      {
        priceUf: rows.filter((r) => r.priceUf !== null).length,
        bedrooms: rows.filter((r) => r.bedrooms !== null).length,
        totalAreaM2: rows.filter((r) => r.totalAreaM2 !== null).length,
      },
      { priceUf: mean(prices), totalAreaM2: mean(areas) },
      rows.filter((r) => Date.parse(r.scrapedAt) >= since).length
    );
  }

  async close(): Promise<void> {}
}

export const COLLECTION = 'properties';

/**
 * MongoDB-backed store. `listingId` is unique among non-empty ids, so a
 * re-scrape replaces the earlier row.
 */
export class MongoPropertyStore implements PersistenceGateway {
  private client: MongoClient;
  private collection: Collection<PropertyDocument> | null = null;

  constructor(
    uri: string,
    private readonly database: string
  ) {
    this.client = new MongoClient(uri);
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.collection = this.client.db(this.database).collection<PropertyDocument>(COLLECTION);
      await this.collection.createIndex(
        { listingId: 1 },
        { unique: true, partialFilterExpression: { listingId: { $type: 'string', $gt: '' } } }
      );
      await this.collection.createIndex({ scrapedAt: -1 });
      log(`✅ Connected to MongoDB ${this.database}.${COLLECTION}`);
    } catch (err) {
      throw new PersistenceError(`Failed to connect to MongoDB: ${errorMessage(err)}`, err);
    }
  }

  private requireCollection(): Collection<PropertyDocument> {
    if (!this.collection) throw new PersistenceError('MongoDB not connected. Call connect() first.');
    return this.collection;
  }

  async upsert(record: PropertyRecord): Promise<void> {
    const collection = this.requireCollection();
    const doc = toDocument(record);
    try {
      if (record.listingId) {
        await collection.replaceOne({ listingId: record.listingId }, doc, { upsert: true });
      } else {
        await collection.insertOne(doc);
      }
    } catch (err) {
      throw new PersistenceError(`Failed to upsert listing ${record.listingId || '(no id)'}: ${errorMessage(err)}`, err);
    }
  }

  async aggregateStats(windowMs: number = DAY_MS): Promise<StoreStats> {
    const collection = this.requireCollection();
    const since = new Date(Date.now() - windowMs).toISOString();
    const averageOf = async (field: 'priceUf' | 'totalAreaM2'): Promise<number | null> => {
      const pipeline: Document[] = [
        { $match: { [field]: { $gt: 0 } } },
        { $group: { _id: null, avg: { $avg: `$${field}` } } },
      ];
      const [row] = await collection.aggregate<{ avg: number | null }>(pipeline).toArray();
      return row ? row.avg : null;
    };

    try {
      const [total, priceUf, bedrooms, totalAreaM2, avgPrice, avgArea, recent] = await Promise.all([
        collection.countDocuments(),
        collection.countDocuments({ priceUf: { $ne: null } }),
        collection.countDocuments({ bedrooms: { $ne: null } }),
        collection.countDocuments({ totalAreaM2: { $ne: null } }),
        averageOf('priceUf'),
        averageOf('totalAreaM2'),
        collection.countDocuments({ scrapedAt: { $gte: since } }),
      ]);
      return buildStats(total, { priceUf, bedrooms, totalAreaM2 }, { priceUf: avgPrice, totalAreaM2: avgArea }, recent);
    } catch (err) {
      throw new PersistenceError(`Failed to aggregate stats: ${errorMessage(err)}`, err);
    }
  }

  async close(): Promise<void> {
    await this.client.close();
    log('Property store connection closed');
  }
}

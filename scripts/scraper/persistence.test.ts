import { describe, expect, it } from 'vitest';
import { PersistenceError } from './errors';
import { MemoryPropertyStore, MongoPropertyStore, buildStats, fromDocument, toDocument } from './persistence';
import { createRecord } from './record';
import type { PropertyRecord } from './types';

const record = (listingId: string, fields: Partial<PropertyRecord> = {}): PropertyRecord => ({
  ...createRecord({
    listingId,
    title: `Listing ${listingId}`,
    url: `https://www.portalinmobiliario.com/MLC-${listingId}`,
    scrapedAt: '2024-05-01T12:00:00.000Z',
  }),
  ...fields,
});

describe('document mapping', () => {
  it('stores list fields as JSON text', () => {
    const doc = toDocument(record('1', { amenityList: ['pool', 'gym'] }));
    expect(doc.amenities).toBe('["pool","gym"]');
    expect(doc.imageUrls).toBe('[]');
    expect('amenityList' in doc).toBe(false);
  });

  it('restores the record from its document', () => {
    const original = record('1', { amenityList: ['terrace'], imageUrls: ['https://img.test/a.jpg'], priceUf: 4200 });
    expect(fromDocument(toDocument(original))).toEqual(original);
  });
});

describe('MemoryPropertyStore', () => {
  it('keeps one row per listing id, reflecting the last write', async () => {
    const store = new MemoryPropertyStore();
    await store.upsert(record('1', { price: 'UF 5.000' }));
    await store.upsert(record('1', { price: 'UF 4.800' }));

    const rows = store.rows();
    expect(rows).toHaveLength(1);
    expect(rows[0].price).toBe('UF 4.800');
  });

  it('inserts every record without an id', async () => {
    const store = new MemoryPropertyStore();
    await store.upsert(record(''));
    await store.upsert(record(''));
    expect(store.rows()).toHaveLength(2);
  });

  it('aggregates coverage, averages and recent rows', async () => {
    const store = new MemoryPropertyStore(() => Date.parse('2024-05-02T00:00:00.000Z'));
    await store.upsert(record('1', { priceUf: 8000, bedrooms: 3, totalAreaM2: 80, scrapedAt: '2024-05-01T12:00:00.000Z' }));
    await store.upsert(record('2', { priceUf: 10000, totalAreaM2: 100, scrapedAt: '2024-04-20T00:00:00.000Z' }));
    await store.upsert(record('3', { bedrooms: 2, scrapedAt: '2024-05-01T20:00:00.000Z' }));

    expect(await store.aggregateStats()).toEqual({
      totalCount: 3,
      fieldCoverageCounts: { priceUf: 2, bedrooms: 2, totalAreaM2: 2 },
      averages: { priceUf: 9000, totalAreaM2: 90 },
      recentCount: 2,
      completenessRate: { priceUf: (2 / 3) * 100, bedrooms: (2 / 3) * 100, totalAreaM2: (2 / 3) * 100 },
    });
  });

  it('reports empty averages for an empty store', async () => {
    const stats = await new MemoryPropertyStore().aggregateStats();
    expect(stats.totalCount).toBe(0);
    expect(stats.averages).toEqual({ priceUf: null, totalAreaM2: null });
    expect(stats.completenessRate).toEqual({ priceUf: 0, bedrooms: 0, totalAreaM2: 0 });
  });
});

describe('buildStats', () => {
  it('rounds averages to two decimals', () => {
    const stats = buildStats(4, { priceUf: 1, bedrooms: 2, totalAreaM2: 4 }, { priceUf: 1234.5678, totalAreaM2: null }, 1);
    expect(stats.averages).toEqual({ priceUf: 1234.57, totalAreaM2: null });
    expect(stats.completenessRate).toEqual({ priceUf: 25, bedrooms: 50, totalAreaM2: 100 });
  });
});

describe('MongoPropertyStore', () => {
  it('refuses writes before connecting', async () => {
    const store = new MongoPropertyStore('mongodb://localhost:27017', 'listings_test');
    await expect(store.upsert(record('1'))).rejects.toBeInstanceOf(PersistenceError);
    await store.close();
  });
});

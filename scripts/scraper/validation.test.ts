import { describe, expect, it } from 'vitest';
import { createRecord } from './record';
import type { PropertyRecord } from './types';
import { clean, findOutliers, score } from './validation';

const record = (fields: Partial<PropertyRecord> = {}): PropertyRecord => ({
  ...createRecord({
    listingId: '123456789',
    title: 'Departamento en venta',
    url: 'https://www.portalinmobiliario.com/MLC-123456789',
    scrapedAt: '2024-05-01T12:00:00.000Z',
  }),
  ...fields,
});

describe('clean', () => {
  it('normalizes free text and lists', () => {
    const cleaned = clean(
      record({
        title: '  Departamento   en venta ',
        address: '  AV. LOS MILITARES 5600,   las condes ',
        neighborhood: 'el golf',
        agentInfo: '   ',
        amenityList: [' Pool', 'gym', 'pool', ''],
        imageUrls: ['https://img.test/1.jpg', 'https://img.test/1.jpg'],
      })
    );

    expect(cleaned.title).toBe('Departamento en venta');
    expect(cleaned.address).toBe('Av. Los Militares 5600, Las Condes');
    expect(cleaned.neighborhood).toBe('El Golf');
    expect(cleaned.agentInfo).toBeNull();
    expect(cleaned.amenityList).toEqual(['pool', 'gym']);
    expect([cleaned.hasPool, cleaned.hasGym, cleaned.hasSecurity]).toEqual([true, true, null]);
    expect(cleaned.imageUrls).toEqual(['https://img.test/1.jpg']);
  });

  it('title-cases accented words', () => {
    expect(clean(record({ neighborhood: 'ÑUÑOA ÁREA CENTRO' })).neighborhood).toBe('Ñuñoa Área Centro');
  });

  it('is idempotent', () => {
    const once = clean(
      record({
        title: ' a  b ',
        address: 'calle UNO 123, vitacura',
        comuna: ' Vitacura ',
        amenityList: ['Gym', 'gym', 'Security'],
      })
    );
    expect(clean(once)).toEqual(once);
  });

  it('reports outliers without changing them', () => {
    const messages: string[] = [];
    const cleaned = clean(record({ totalAreaM2: 5000, bedrooms: 12, latitude: -40, longitude: -70.5 }), (m) =>
      messages.push(m)
    );

    expect(cleaned.totalAreaM2).toBe(5000);
    expect(cleaned.bedrooms).toBe(12);
    expect(messages).toEqual([
      'Unusual area detected: 5000 m2',
      'Coordinates outside Santiago area: -40, -70.5',
      'Unusual bedroom count: 12',
    ]);
  });
});

describe('findOutliers', () => {
  it('accepts values inside the plausible ranges', () => {
    expect(
      findOutliers(record({ totalAreaM2: 80, builtAreaM2: 70, latitude: -33.42, longitude: -70.6, bedrooms: 3, bathrooms: 2 }))
    ).toEqual([]);
  });

  it('flags a high bathroom count and a small built area', () => {
    expect(findOutliers(record({ builtAreaM2: 10, bathrooms: 9 }))).toEqual([
      'Unusual built area detected: 10 m2',
      'Unusual bathroom count: 9',
    ]);
  });
});

describe('score', () => {
  it('scores an empty record as invalid with every core issue', () => {
    expect(score(record())).toEqual({
      score: 0,
      maxScore: 20,
      completenessPercentage: 0,
      issues: ['Missing price information', 'Missing bedroom count', 'Missing area information', 'Missing location information'],
      isValid: false,
    });
  });

  it('caps core and bonus points at the ceiling', () => {
    const result = score(
      record({
        price: 'UF 8.500',
        currency: 'UF',
        priceUf: 8500,
        bedrooms: 3,
        totalAreaM2: 90,
        neighborhood: 'El Golf',
        bathrooms: 2,
        latitude: -33.41,
        longitude: -70.58,
      })
    );
    expect(result).toEqual({ score: 20, maxScore: 20, completenessPercentage: 100, issues: [], isValid: true });
  });

  it('requires a known currency for the price check', () => {
    expect(score(record({ price: 'Consultar' })).issues).toContain('Missing price information');
  });

  it('counts bonus points below the ceiling', () => {
    const result = score(record({ bedrooms: 2, bathrooms: 1, parkingSpots: 1, agentInfo: 'Corredora' }));
    expect(result.score).toBe(8);
    expect(result.isValid).toBe(false);
    expect(result.issues).toEqual(['Missing price information', 'Missing area information', 'Missing location information']);
  });

  it('is valid at exactly half the points', () => {
    const result = score(record({ bedrooms: 2, totalAreaM2: 60 }));
    expect(result.score).toBe(10);
    expect(result.isValid).toBe(true);
  });

  it('depends only on record contents', () => {
    const a = record({ bedrooms: 2, bathrooms: 1, agentInfo: 'Corredora' });
    const b = { ...a, listingId: 'other', scrapedAt: '2020-01-01T00:00:00.000Z' };
    expect(score(a)).toEqual(score(b));
  });
});

import type { PropertyRecord } from './types';

export type RecordSeed = Pick<PropertyRecord, 'listingId' | 'title' | 'url'> & { scrapedAt?: string };

/** A record with every optional field unset; `scrapedAt` defaults to now. */
export function createRecord(seed: RecordSeed): PropertyRecord {
  return {
    listingId: seed.listingId,
    title: seed.title,
    url: seed.url,

    price: '',
    priceUf: null,
    priceClp: null,
    currency: null,
    maintenanceFee: null,

    bedrooms: null,
    bathrooms: null,
    totalAreaM2: null,
    builtAreaM2: null,
    parkingSpots: null,

    address: null,
    neighborhood: null,
    comuna: null,
    latitude: null,
    longitude: null,
    floorNumber: null,

    buildingAgeYears: null,
    totalFloors: null,
    hasElevator: null,
    orientation: null,

    amenityList: [],
    hasPool: null,
    hasGym: null,
    hasSecurity: null,

    imageUrls: [],
    videoUrl: null,

    listingDateText: null,
    daysOnMarket: null,
    agentInfo: null,
    scrapedAt: seed.scrapedAt || new Date().toISOString(),
  };
}

/** Copies the patch onto the record without touching `scrapedAt` or identity. */
export function applyPatch(record: PropertyRecord, patch: Partial<PropertyRecord>): PropertyRecord {
  const { listingId: _id, scrapedAt: _at, ...fields } = patch;
  return { ...record, ...fields };
}

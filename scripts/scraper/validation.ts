import { amenityFlags } from './parsing';
import { MAX_IMAGES } from './extractor';
import type { PropertyRecord, ValidationResult } from './types';

export const MAX_SCORE = 20;
export const VALID_SCORE = 10;

export const PLAUSIBLE = {
  areaM2: [20, 1000],
  latitude: [-33.7, -33.2],
  longitude: [-71.0, -70.3],
  maxBedrooms: 10,
  maxBathrooms: 8,
} as const;

const collapse = (s: string) => s.replace(/\s+/g, ' ').trim();

const titleCase = (s: string) =>
  s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());

const cleanText = (s: string | null, transform: (s: string) => string = (x) => x): string | null => {
  if (s === null) return null;
  const out = collapse(s);
  return out === '' ? null : transform(out);
};

const unique = <T>(items: readonly T[]): T[] => Array.from(new Set(items));

/** Values outside the plausible ranges; the record itself is left as is. */
export function findOutliers(record: PropertyRecord): string[] {
  const outliers: string[] = [];
  const [minArea, maxArea] = PLAUSIBLE.areaM2;
  if (record.totalAreaM2 !== null && (record.totalAreaM2 < minArea || record.totalAreaM2 > maxArea)) {
    outliers.push(`Unusual area detected: ${record.totalAreaM2} m2`);
  }
  if (record.builtAreaM2 !== null && (record.builtAreaM2 < minArea || record.builtAreaM2 > maxArea)) {
    outliers.push(`Unusual built area detected: ${record.builtAreaM2} m2`);
  }
  if (record.latitude !== null && record.longitude !== null) {
    const [minLat, maxLat] = PLAUSIBLE.latitude;
    const [minLon, maxLon] = PLAUSIBLE.longitude;
    const inside =
      record.latitude >= minLat && record.latitude <= maxLat && record.longitude >= minLon && record.longitude <= maxLon;
    if (!inside) outliers.push(`Coordinates outside Santiago area: ${record.latitude}, ${record.longitude}`);
  }
  if (record.bedrooms !== null && record.bedrooms > PLAUSIBLE.maxBedrooms) {
    outliers.push(`Unusual bedroom count: ${record.bedrooms}`);
  }
  if (record.bathrooms !== null && record.bathrooms > PLAUSIBLE.maxBathrooms) {
    outliers.push(`Unusual bathroom count: ${record.bathrooms}`);
  }
  return outliers;
}

/**
 * Normalizes free text and list fields. Out-of-range values are reported
 * through `onOutlier` and kept unchanged.
 */
export function clean(record: PropertyRecord, onOutlier?: (message: string) => void): PropertyRecord {
  const amenityList = unique(record.amenityList.map((a) => a.trim().toLowerCase()).filter((a) => a !== ''));
  const cleaned: PropertyRecord = {
    ...record,
    title: collapse(record.title),
    price: collapse(record.price),
    maintenanceFee: cleanText(record.maintenanceFee),
    address: cleanText(record.address, titleCase),
    neighborhood: cleanText(record.neighborhood, titleCase),
    comuna: cleanText(record.comuna),
    orientation: cleanText(record.orientation),
    agentInfo: cleanText(record.agentInfo),
    amenityList,
    ...amenityFlags(amenityList),
    imageUrls: unique(record.imageUrls).slice(0, MAX_IMAGES),
  };
  if (onOutlier) findOutliers(cleaned).forEach((message) => onOutlier(message));
  return cleaned;
}

const present = (n: number | null): boolean => n !== null && n > 0;
const filled = (s: string | null): boolean => s !== null && s !== '';

/** Completeness score, capped at 20; a record is valid at 10 or more. */
export function score(record: PropertyRecord): ValidationResult {
  let total = 0;
  const issues: string[] = [];

  const core: Array<[boolean, string]> = [
    [filled(record.price) && record.currency !== null, 'Missing price information'],
    [present(record.bedrooms), 'Missing bedroom count'],
    [present(record.totalAreaM2), 'Missing area information'],
    [filled(record.address) || filled(record.neighborhood), 'Missing location information'],
  ];
  for (const [ok, issue] of core) {
    if (ok) total += 5;
    else issues.push(issue);
  }

  const bonus = [
    present(record.bathrooms),
    present(record.parkingSpots),
    record.latitude !== null && record.longitude !== null,
    record.amenityList.length > 0,
    filled(record.agentInfo),
  ];
  total = Math.min(MAX_SCORE, total + bonus.filter(Boolean).length);

  return {
    score: total,
    maxScore: MAX_SCORE,
    completenessPercentage: (total / MAX_SCORE) * 100,
    issues,
    isValid: total >= VALID_SCORE,
  };
}

// Locale-specific parsing of listing text. Patterns and keyword tables are
// data; the functions below only walk them.

import comunaNames from './data/comunas.json';
import type { Currency, PropertyRecord } from './types';

/**
 * Parses a number written with `.` as thousands separator and an optional
 * `,dd` decimal tail ("8.500" -> 8500, "85,5" -> 85.5). Any other comma is
 * read as a thousands separator.
 */
export function parseLocaleNumber(raw: string): number | null {
  const compact = raw.replace(/\s+/g, '');
  if (!/\d/.test(compact)) return null;
  const decimal = compact.match(/^([\d.,]*?),(\d{1,2})$/);
  const normalized = decimal
    ? `${decimal[1].replace(/[.,]/g, '')}.${decimal[2]}`
    : compact.replace(/[.,]/g, '');
  const n = Number(normalized);
  return normalized !== '' && Number.isFinite(n) ? n : null;
}

export type ParsedPrice = {
  priceUf: number | null;
  priceClp: number | null;
  currency: Currency | null;
};

const CLP_PATTERN = /\$\s*(\d[\d.,]*)/;
const UF_PATTERN = /\bUF\s*(\d[\d.,]*)|(\d[\d.,]*)\s*UF\b/i;

const trimSeparators = (s: string) => s.replace(/[.,]+$/, '');

/** Reads UF and CLP figures from a price string; both are kept when present. */
export function parsePrice(text: string): ParsedPrice {
  const clpMatch = text.match(CLP_PATTERN);
  const priceClp = clpMatch ? parseLocaleNumber(trimSeparators(clpMatch[1])) : null;

  const rest = clpMatch ? text.replace(clpMatch[0], ' ') : text;
  const ufMatch = rest.match(UF_PATTERN);
  const ufRaw = ufMatch ? ufMatch[1] ?? ufMatch[2] : undefined;
  const priceUf = ufRaw ? parseLocaleNumber(trimSeparators(ufRaw)) : null;

  const currency: Currency | null = priceUf !== null ? 'UF' : priceClp !== null ? 'CLP' : null;
  return { priceUf, priceClp, currency };
}

export const isPriceLike = (text: string): boolean => /\$|\bUF\b|\bCLP\b|\d/i.test(text);

const MAINTENANCE_PATTERN = /gastos\s+comunes[^$\d]{0,40}(\$\s*\d[\d.,]*\d)/i;

export function parseMaintenanceFee(text: string): string | null {
  const match = text.match(MAINTENANCE_PATTERN);
  return match ? match[1].replace(/\s+/g, ' ') : null;
}

export const PHYSICAL_FIELDS = ['bedrooms', 'bathrooms', 'totalAreaM2', 'builtAreaM2', 'parkingSpots'] as const;

export type PhysicalField = (typeof PHYSICAL_FIELDS)[number];

type AttributeRule = {
  field: PhysicalField;
  patterns: RegExp[];
  parse: (raw: string) => number | null;
};

const toInt = (raw: string): number | null => {
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : null;
};

const AREA = String.raw`(\d[\d.]*(?:,\d+)?)`;

/** Applied to lower-cased text; the first pattern that matches wins. */
export const ATTRIBUTE_RULES: AttributeRule[] = [
  {
    field: 'bedrooms',
    patterns: [/(\d+)\s*(?:dormitorios?|dorms?\b|bedrooms?)/, /dormitorios?\s*:?\s*(\d+)/],
    parse: toInt,
  },
  {
    field: 'bathrooms',
    patterns: [/(\d+)\s*(?:baños?|bathrooms?|baths?\b)/, /baños?\s*:?\s*(\d+)/],
    parse: toInt,
  },
  {
    field: 'totalAreaM2',
    patterns: [
      new RegExp(`${AREA}\\s*m(?:²|2)?\\s*(?:totales?|const)`),
      new RegExp(`superficie\\s+total\\s*:?\\s*${AREA}\\s*m`),
    ],
    parse: parseLocaleNumber,
  },
  {
    field: 'builtAreaM2',
    patterns: [
      new RegExp(`${AREA}\\s*m(?:²|2)?\\s*(?:útiles?|utiles?|built)`),
      new RegExp(`superficie\\s+[úu]til\\s*:?\\s*${AREA}\\s*m`),
    ],
    parse: parseLocaleNumber,
  },
  {
    field: 'parkingSpots',
    patterns: [/(\d+)\s*(?:estacionamientos?|parking|garages?)/, /estacionamientos?\s*:?\s*(\d+)/],
    parse: toInt,
  },
];

export type PhysicalAttributes = Partial<Record<PhysicalField, number>>;

/** Matches every attribute rule against one block of text. */
export function parseAttributes(text: string): PhysicalAttributes {
  const lower = text.toLowerCase();
  const found: PhysicalAttributes = {};
  for (const rule of ATTRIBUTE_RULES) {
    for (const pattern of rule.patterns) {
      const match = lower.match(pattern);
      const value = match ? rule.parse(match[1]) : null;
      if (value !== null) {
        found[rule.field] = value;
        break;
      }
    }
  }
  return found;
}

const fold = (s: string) =>
  s
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();

export const KNOWN_COMUNAS: readonly string[] = comunaNames;

const isLetter = (ch: string | undefined) => ch !== undefined && /[a-z]/.test(ch);

/**
 * Finds the known comuna mentioned earliest in `text` (longest name on ties),
 * ignoring case and accents.
 */
export function findComuna(text: string, comunas: readonly string[] = KNOWN_COMUNAS): string | null {
  const haystack = fold(text);
  let best: { name: string; at: number } | null = null;
  for (const name of comunas) {
    const needle = fold(name);
    let at = haystack.indexOf(needle);
    while (at !== -1 && (isLetter(haystack[at - 1]) || isLetter(haystack[at + needle.length]))) {
      at = haystack.indexOf(needle, at + 1);
    }
    if (at === -1) continue;
    if (!best || at < best.at || (at === best.at && name.length > best.name.length)) {
      best = { name, at };
    }
  }
  return best ? best.name : null;
}

export function neighborhoodFrom(address: string): string | null {
  const parts = address.split(',');
  if (parts.length < 2) return null;
  const head = parts[0].trim();
  return head === '' ? null : head;
}

const YEAR_BUILT_PATTERNS: RegExp[] = [
  /a[ñn]o\s+de\s+construcci[oó]n\s*:?\s*(\d{4})\b/,
  /construid[oa]\s+en\s+(?:el\s+a[ñn]o\s+)?(\d{4})\b/,
  /year\s+built\s*:?\s*(\d{4})\b/,
  /\b(\d{4})\s*(?:a[ñn]o|year)/,
];

const AGE_PATTERN = /antig[üu]edad\s*:?\s*(\d{1,3})\s*a[ñn]os?/;

/** Building age in years, from a construction year or a stated age. */
export function parseBuildingAge(text: string, currentYear: number): number | null {
  const lower = text.toLowerCase();
  for (const pattern of YEAR_BUILT_PATTERNS) {
    const match = lower.match(pattern);
    if (!match) continue;
    const year = parseInt(match[1], 10);
    if (year > 1900 && year <= currentYear) return currentYear - year;
  }
  const age = lower.match(AGE_PATTERN);
  if (!age) return null;
  const years = parseInt(age[1], 10);
  return years < currentYear - 1900 ? years : null;
}

const FLOOR_PATTERNS: RegExp[] = [
  /n[uú]mero\s+de\s+piso(?:\s+de\s+la\s+unidad)?\s*:?\s*(\d{1,2})\b/,
  /\bpiso\s*(?:n[°º]\s*)?(\d{1,2})\b/,
  /\bfloor\s*(\d{1,2})\b/,
];

const TOTAL_FLOORS_PATTERNS: RegExp[] = [/cantidad\s+de\s+pisos\s*:?\s*(\d{1,3})\b/, /\b(\d{1,3})\s*pisos\b/];

const firstInt = (text: string, patterns: RegExp[]): number | null => {
  const lower = text.toLowerCase();
  for (const pattern of patterns) {
    const match = lower.match(pattern);
    if (match) return parseInt(match[1], 10);
  }
  return null;
};

export const parseFloorNumber = (text: string) => firstInt(text, FLOOR_PATTERNS);
export const parseTotalFloors = (text: string) => firstInt(text, TOTAL_FLOORS_PATTERNS);

export function parseElevator(text: string): boolean | null {
  const lower = text.toLowerCase();
  if (/sin\s+ascensor|no\s+elevator|without\s+elevator/.test(lower)) return false;
  if (/ascensor|elevator/.test(lower)) return true;
  return null;
}

const ORIENTATIONS = [
  'nororiente',
  'norponiente',
  'suroriente',
  'surponiente',
  'noreste',
  'noroeste',
  'sureste',
  'suroeste',
  'oriente',
  'poniente',
  'norte',
  'sur',
  'este',
  'oeste',
];

const ORIENTATION_PATTERN = new RegExp(`orientaci[oó]n\\s*:?\\s*(${ORIENTATIONS.join('|')})\\b`);

export function parseOrientation(text: string): string | null {
  const match = text.toLowerCase().match(ORIENTATION_PATTERN);
  return match ? match[1].charAt(0).toUpperCase() + match[1].slice(1) : null;
}

/** Source-language keywords per canonical amenity tag, in reporting order. */
export const AMENITY_TABLE: ReadonlyArray<{ tag: string; keywords: string[] }> = [
  { tag: 'pool', keywords: ['piscina'] },
  { tag: 'gym', keywords: ['gimnasio'] },
  { tag: 'security', keywords: ['seguridad'] },
  { tag: 'doorman', keywords: ['portero', 'conserje'] },
  { tag: 'garden', keywords: ['jardin', 'jardín'] },
  { tag: 'terrace', keywords: ['terraza'] },
  { tag: 'balcony', keywords: ['balcon', 'balcón'] },
  { tag: 'storage', keywords: ['bodega'] },
  { tag: 'bbq area', keywords: ['quincho'] },
  { tag: 'multipurpose room', keywords: ['sala multiuso'] },
  { tag: 'event room', keywords: ['salon de eventos', 'salón de eventos'] },
];

export function parseAmenities(text: string): string[] {
  const lower = text.toLowerCase();
  return AMENITY_TABLE.filter(({ keywords }) => keywords.some((k) => lower.includes(k))).map(({ tag }) => tag);
}

type AmenityFlags = Pick<PropertyRecord, 'hasPool' | 'hasGym' | 'hasSecurity'>;

/** Flags are `true` when the tag is present and `null` (not found) otherwise. */
export function amenityFlags(amenities: readonly string[]): AmenityFlags {
  const has = (...tags: string[]) => (tags.some((t) => amenities.includes(t)) ? true : null);
  return {
    hasPool: has('pool'),
    hasGym: has('gym'),
    hasSecurity: has('security', 'doorman'),
  };
}

const LISTING_AGE_UNITS: ReadonlyArray<{ pattern: RegExp; days: number }> = [
  { pattern: /^d[ií]as?$/, days: 1 },
  { pattern: /^mes(?:es)?$/, days: 30 },
  { pattern: /^a[ñn]os?$/, days: 365 },
];

export function parseListingAge(text: string): { listingDateText: string; daysOnMarket: number } | null {
  const lower = text.toLowerCase();
  if (/publicado\s+hoy/.test(lower)) return { listingDateText: 'hoy', daysOnMarket: 0 };
  const match = lower.match(/publicado\s+hace\s+(\d+)\s+(d[ií]as?|mes(?:es)?|a[ñn]os?)/);
  if (!match) return null;
  const amount = parseInt(match[1], 10);
  const unit = LISTING_AGE_UNITS.find((u) => u.pattern.test(match[2]));
  if (!unit) return null;
  return { listingDateText: `hace ${amount} ${match[2]}`, daysOnMarket: amount * unit.days };
}

export type Coordinates = { latitude: number; longitude: number };

export function parseScriptCoordinates(script: string): Coordinates | null {
  const lat = script.match(/["']?lat(?:itude)?["']?\s*[:=]\s*["']?(-?\d+\.\d+)/i);
  const lng = script.match(/["']?(?:lng|lon|longitude)["']?\s*[:=]\s*["']?(-?\d+\.\d+)/i);
  if (!lat || !lng) return null;
  return { latitude: Number(lat[1]), longitude: Number(lng[1]) };
}

export function parseMapCenter(src: string): Coordinates | null {
  const match = src.match(/center=(-?\d+\.\d+)(?:,|%2C)(-?\d+\.\d+)/i);
  return match ? { latitude: Number(match[1]), longitude: Number(match[2]) } : null;
}

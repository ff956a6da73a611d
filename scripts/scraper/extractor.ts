import {
  Coordinates,
  PHYSICAL_FIELDS,
  PhysicalAttributes,
  amenityFlags,
  findComuna,
  isPriceLike,
  neighborhoodFrom,
  parseAmenities,
  parseAttributes,
  parseBuildingAge,
  parseElevator,
  parseFloorNumber,
  parseListingAge,
  parseMaintenanceFee,
  parseMapCenter,
  parseOrientation,
  parsePrice,
  parseScriptCoordinates,
  parseTotalFloors,
} from './parsing';
import { Probe, attrProbes, firstPlausible, lengthBetween, textProbes } from './probe';
import type { ListingReference, PageDriver, PropertyRecord } from './types';

/** Selector chains, most specific first. */
export const SELECTORS = {
  cards: [
    '.ui-search-layout__item',
    '.ui-search-result',
    'li[class*="search-layout"]',
    '[class*="result"]',
    '[class*="card"]',
    '[class*="listing"]',
    'article',
    'div[class*="MLC"]',
    'a[href*="MLC"]',
  ],
  cardTitle: [
    '.poly-component__title',
    '.ui-search-item__title',
    'h2',
    'h3',
    '[class*="title"]',
    'a[href*="MLC"]',
  ],
  cardPrice: [
    '.andes-money-amount',
    '[class*="price"]',
    '[class*="money"]',
    '[class*="amount"]',
    '.andes-money-amount__fraction',
  ],
  cardLink: ['.ui-search-item__group--title a', 'a[href*="MLC"]', '[data-testid="item-link"]', 'a'],
  nextPage: [
    '.andes-pagination__button--next:not(.andes-pagination__button--disabled) a',
    '.andes-pagination__button--next:not([disabled])',
    'a[title="Siguiente"]',
  ],
  price: [
    '.ui-pdp-price__second-line',
    '.andes-money-amount',
    '[class*="price"]',
    '.andes-money-amount__fraction',
    '.price-tag-fraction',
  ],
  maintenance: ['[class*="maintenance"]', '[class*="gastos"]'],
  attributes: [
    '.andes-table tbody tr',
    '[class*="attribute"]',
    '.ui-pdp-container .ui-pdp-attributes',
    '[class*="specs"] div',
    '.property-features li',
  ],
  address: ['.ui-pdp-media__title', '[class*="address"]', '[class*="location"]'],
  mapImage: ['img[src*="maps.googleapis.com"]', '[class*="map"] img'],
  images: ['.ui-pdp-gallery img', '[class*="gallery"] img', '.property-images img', 'img[src*="http"]'],
  video: ['iframe[src*="youtube"]', 'iframe[src*="vimeo"]', 'video source'],
  agent: ['.ui-pdp-seller__header__title', '[class*="seller"]', '[class*="agent"]'],
} as const;

export const MAX_IMAGES = 10;

const CARD_TITLE_LENGTH = lengthBetween(11, 200);
const CARD_PRICE_LENGTH = lengthBetween(1, 80);
const DETAIL_LINK = /MLC|departamento/i;

const selfProbe = (label: string, run: () => Promise<string | null>): Probe<string> => ({ label, run });

const absolute = (href: string, baseUrl: string): string => {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
};

/**
 * Reads title, price text and detail link from one listing card.
 * Returns null when the card yields none of the three.
 */
export async function extractCard<E>(
  page: PageDriver<E>,
  card: E,
  ctx: { sourceSelector: string; pageIndex: number; baseUrl: string }
): Promise<ListingReference | null> {
  const title = await firstPlausible(
    [...textProbes(page, SELECTORS.cardTitle, card), selfProbe('card text', async () => (await page.text(card)).trim())],
    CARD_TITLE_LENGTH
  );
  const price = await firstPlausible(
    textProbes(page, SELECTORS.cardPrice, card),
    (t) => CARD_PRICE_LENGTH(t) && isPriceLike(t)
  );
  const link = await firstPlausible(
    [...attrProbes(page, SELECTORS.cardLink, 'href', card), selfProbe('card href', () => page.attr(card, 'href'))],
    (href) => DETAIL_LINK.test(href)
  );

  if (!title && !price && !link) return null;

  const reference: ListingReference = { sourceSelector: ctx.sourceSelector, pageIndex: ctx.pageIndex };
  if (title) reference.title = title.value;
  if (price) reference.rawPriceText = price.value;
  if (link) reference.detailUrl = absolute(link.value, ctx.baseUrl);
  return reference;
}

/** True when a "next page" control is present and not disabled. */
export async function hasNextPage<E>(page: PageDriver<E>): Promise<boolean> {
  const hit = await firstPlausible<boolean>(
    SELECTORS.nextPage.map((selector) => ({
      label: selector,
      run: async () => {
        const [el] = await page.queryAll(selector);
        if (el === undefined) return null;
        const disabled = (await page.attr(el, 'aria-disabled')) === 'true' || (await page.attr(el, 'disabled')) !== null;
        return !disabled;
      },
    })),
    (enabled) => enabled
  );
  return hit !== null;
}

export type DetailContext<E> = {
  page: PageDriver<E>;
  /** Memoized body text of the detail page. */
  bodyText: () => Promise<string>;
  title: string;
  currentYear: number;
};

export type DetailPatch = Partial<PropertyRecord>;

export async function extractFinancial<E>(ctx: DetailContext<E>): Promise<DetailPatch> {
  const patch: DetailPatch = {};
  const price = await firstPlausible(textProbes(ctx.page, SELECTORS.price), (t) => lengthBetween(1, 120)(t) && isPriceLike(t));
  if (price) {
    patch.price = price.value;
    Object.assign(patch, parsePrice(price.value));
  }

  const fee = await firstPlausible<string>(
    [
      ...textProbes(ctx.page, SELECTORS.maintenance).map((p) => ({
        label: p.label,
        run: async () => {
          const text = await p.run();
          return text ? parseMaintenanceFee(`gastos comunes ${text}`) : null;
        },
      })),
      { label: 'body text', run: async () => parseMaintenanceFee(await ctx.bodyText()) },
    ],
    (t) => t.length > 0
  );
  if (fee) patch.maintenanceFee = fee.value;
  return patch;
}

export async function extractPhysical<E>(ctx: DetailContext<E>): Promise<DetailPatch> {
  const found: PhysicalAttributes = {};
  const merge = (attrs: PhysicalAttributes) => {
    for (const field of PHYSICAL_FIELDS) {
      if (found[field] === undefined) found[field] = attrs[field];
    }
  };

  for (const selector of SELECTORS.attributes) {
    const rows = await ctx.page.queryAll(selector);
    for (const row of rows) {
      merge(parseAttributes(await ctx.page.text(row)));
    }
  }
  merge(parseAttributes(await ctx.bodyText()));

  return {
    bedrooms: found.bedrooms ?? null,
    bathrooms: found.bathrooms ?? null,
    totalAreaM2: found.totalAreaM2 ?? null,
    builtAreaM2: found.builtAreaM2 ?? null,
    parkingSpots: found.parkingSpots ?? null,
  };
}

const validCoordinates = (c: Coordinates) => Number.isFinite(c.latitude) && Number.isFinite(c.longitude);

export async function extractLocation<E>(ctx: DetailContext<E>, opts: { extractCoordinates: boolean }): Promise<DetailPatch> {
  const patch: DetailPatch = {};
  const address = await firstPlausible(textProbes(ctx.page, SELECTORS.address), lengthBetween(6, 200));
  if (address) {
    patch.address = address.value;
    patch.neighborhood = neighborhoodFrom(address.value);
  }
  patch.comuna = findComuna(address?.value ?? '') ?? findComuna(ctx.title);

  if (opts.extractCoordinates) {
    const { page } = ctx;
    const coords = await firstPlausible<Coordinates>(
      [
        {
          label: '[data-lat]',
          run: async () => {
            const [el] = await page.queryAll('[data-lat]');
            if (el === undefined) return null;
            const lat = await page.attr(el, 'data-lat');
            const lng = (await page.attr(el, 'data-lng')) ?? (await page.attr(el, 'data-longitude'));
            return lat && lng ? { latitude: Number(lat), longitude: Number(lng) } : null;
          },
        },
        {
          label: 'script',
          run: async () => {
            for (const script of await page.queryAll('script')) {
              const found = parseScriptCoordinates(await page.text(script));
              if (found) return found;
            }
            return null;
          },
        },
        ...attrProbes(page, SELECTORS.mapImage, 'src').map((p) => ({
          label: p.label,
          run: async () => {
            const src = await p.run();
            return src ? parseMapCenter(src) : null;
          },
        })),
      ],
      validCoordinates
    );
    if (coords) {
      patch.latitude = coords.value.latitude;
      patch.longitude = coords.value.longitude;
    }
  }
  return patch;
}

export async function extractBuilding<E>(ctx: DetailContext<E>): Promise<DetailPatch> {
  const text = await ctx.bodyText();
  return {
    buildingAgeYears: parseBuildingAge(text, ctx.currentYear),
    floorNumber: parseFloorNumber(text),
    totalFloors: parseTotalFloors(text),
    hasElevator: parseElevator(text),
    orientation: parseOrientation(text),
  };
}

export async function extractAmenities<E>(ctx: DetailContext<E>): Promise<DetailPatch> {
  const amenityList = parseAmenities(await ctx.bodyText());
  return { amenityList, ...amenityFlags(amenityList) };
}

export async function extractMedia<E>(ctx: DetailContext<E>): Promise<DetailPatch> {
  const { page } = ctx;
  let imageUrls: string[] = [];
  for (const selector of SELECTORS.images) {
    const images = await page.queryAll(selector);
    for (const img of images.slice(0, MAX_IMAGES)) {
      const src = (await page.attr(img, 'src')) || (await page.attr(img, 'data-src'));
      if (src && src.startsWith('http') && !imageUrls.includes(src)) imageUrls.push(src);
    }
    if (imageUrls.length > 0) break;
  }
  imageUrls = imageUrls.slice(0, MAX_IMAGES);

  const video = await firstPlausible(attrProbes(page, SELECTORS.video, 'src'), (src) => src.length > 0);
  return { imageUrls, videoUrl: video ? video.value : null };
}

export async function extractMetadata<E>(ctx: DetailContext<E>): Promise<DetailPatch> {
  const patch: DetailPatch = {};
  const age = parseListingAge(await ctx.bodyText());
  if (age) {
    patch.listingDateText = age.listingDateText;
    patch.daysOnMarket = age.daysOnMarket;
  }
  const agent = await firstPlausible(textProbes(ctx.page, SELECTORS.agent), lengthBetween(1, 199));
  if (agent) patch.agentInfo = agent.value;
  return patch;
}

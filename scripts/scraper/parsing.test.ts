import { describe, expect, it } from 'vitest';
import {
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
  parseLocaleNumber,
  parseMaintenanceFee,
  parseMapCenter,
  parseOrientation,
  parsePrice,
  parseScriptCoordinates,
  parseTotalFloors,
} from './parsing';

describe('parseLocaleNumber', () => {
  it('reads dots as thousands separators', () => {
    expect(parseLocaleNumber('8.500')).toBe(8500);
    expect(parseLocaleNumber('255.000.000')).toBe(255000000);
  });

  it('reads a short comma tail as decimals', () => {
    expect(parseLocaleNumber('85,5')).toBe(85.5);
    expect(parseLocaleNumber('1.234,56')).toBe(1234.56);
  });

  it('reads other commas as thousands separators', () => {
    expect(parseLocaleNumber('1,234,567')).toBe(1234567);
  });

  it('returns null without digits', () => {
    expect(parseLocaleNumber('')).toBeNull();
    expect(parseLocaleNumber('UF')).toBeNull();
  });
});

describe('parsePrice', () => {
  it('parses a UF suffix', () => {
    expect(parsePrice('8.500 UF')).toEqual({ priceUf: 8500, priceClp: null, currency: 'UF' });
  });

  it('keeps both figures when UF and CLP are present', () => {
    expect(parsePrice('UF 8.500 $ 255.000.000')).toEqual({ priceUf: 8500, priceClp: 255000000, currency: 'UF' });
  });

  it('falls back to CLP', () => {
    expect(parsePrice('$ 450.000')).toEqual({ priceUf: null, priceClp: 450000, currency: 'CLP' });
  });

  it('leaves everything unset for text without figures', () => {
    expect(parsePrice('Consultar precio')).toEqual({ priceUf: null, priceClp: null, currency: null });
  });
});

describe('isPriceLike', () => {
  it('accepts digits or currency markers', () => {
    expect(isPriceLike('UF 3.200')).toBe(true);
    expect(isPriceLike('Consultar')).toBe(false);
  });
});

describe('parseMaintenanceFee', () => {
  it('reads the amount after "gastos comunes"', () => {
    expect(parseMaintenanceFee('Gastos comunes: $ 180.000 aprox.')).toBe('$ 180.000');
  });

  it('returns null without the label', () => {
    expect(parseMaintenanceFee('$ 180.000')).toBeNull();
  });
});

describe('parseAttributes', () => {
  it('reads rooms, area and parking from one text block', () => {
    expect(parseAttributes('3 dormitorios 2 baños 85,5 m² totales 1 estacionamiento')).toEqual({
      bedrooms: 3,
      bathrooms: 2,
      totalAreaM2: 85.5,
      parkingSpots: 1,
    });
  });

  it('reads labelled values', () => {
    expect(parseAttributes('Dormitorios: 4')).toEqual({ bedrooms: 4 });
    expect(parseAttributes('Superficie útil: 72 m²')).toEqual({ builtAreaM2: 72 });
  });
});

describe('findComuna', () => {
  it('returns the comuna mentioned first', () => {
    expect(findComuna('Av. Apoquindo 4500, Las Condes, Santiago')).toBe('Las Condes');
  });

  it('ignores case and accents', () => {
    expect(findComuna('departamento en nunoa')).toBe('Ñuñoa');
  });

  it('requires whole-word matches', () => {
    expect(findComuna('Santiagocentro')).toBeNull();
  });

  it('prefers the longer name on a tie', () => {
    expect(findComuna('San Pedro de la Paz', ['San', 'San Pedro'])).toBe('San Pedro');
  });
});

describe('neighborhoodFrom', () => {
  it('takes the text before the first comma', () => {
    expect(neighborhoodFrom('El Golf, Las Condes')).toBe('El Golf');
    expect(neighborhoodFrom('Las Condes')).toBeNull();
  });
});

describe('building details', () => {
  it('derives age from a construction year', () => {
    expect(parseBuildingAge('Año de construcción: 2015', 2024)).toBe(9);
  });

  it('rejects years outside the accepted range', () => {
    expect(parseBuildingAge('Año de construcción: 2030', 2024)).toBeNull();
  });

  it('falls back to a stated age', () => {
    expect(parseBuildingAge('Antigüedad: 12 años', 2024)).toBe(12);
  });

  it('rejects a stated age older than 1900', () => {
    expect(parseBuildingAge('Antigüedad: 150 años', 2024)).toBeNull();
    expect(parseBuildingAge('Antigüedad: 123 años', 2024)).toBe(123);
  });

  it('reads floor and total floors', () => {
    expect(parseFloorNumber('Departamento en piso 7')).toBe(7);
    expect(parseTotalFloors('Edificio de 20 pisos')).toBe(20);
  });

  it('checks "sin ascensor" before "ascensor"', () => {
    expect(parseElevator('Edificio sin ascensor')).toBe(false);
    expect(parseElevator('Ascensor: Sí')).toBe(true);
    expect(parseElevator('Terraza amplia')).toBeNull();
  });

  it('capitalizes the orientation', () => {
    expect(parseOrientation('Orientación: nororiente')).toBe('Nororiente');
  });
});

describe('amenities', () => {
  it('maps keywords to tags and flags', () => {
    const amenities = parseAmenities('Condominio con piscina temperada y gimnasio equipado');
    expect(amenities).toEqual(['pool', 'gym']);
    expect(amenityFlags(amenities)).toEqual({ hasPool: true, hasGym: true, hasSecurity: null });
  });

  it('counts a doorman as security', () => {
    expect(amenityFlags(parseAmenities('Conserje 24 horas'))).toEqual({ hasPool: null, hasGym: null, hasSecurity: true });
  });
});

describe('parseListingAge', () => {
  it('converts the publication age to days', () => {
    expect(parseListingAge('Publicado hace 3 meses')).toEqual({ listingDateText: 'hace 3 meses', daysOnMarket: 90 });
    expect(parseListingAge('Publicado hace 5 días')).toEqual({ listingDateText: 'hace 5 días', daysOnMarket: 5 });
    expect(parseListingAge('Publicado hoy')).toEqual({ listingDateText: 'hoy', daysOnMarket: 0 });
    expect(parseListingAge('Sin fecha')).toBeNull();
  });
});

describe('coordinates', () => {
  it('reads inline script pairs', () => {
    expect(parseScriptCoordinates('{"latitude": -33.41, "longitude": -70.58}')).toEqual({
      latitude: -33.41,
      longitude: -70.58,
    });
  });

  it('reads a static map center', () => {
    expect(parseMapCenter('https://maps.googleapis.com/maps/api/staticmap?center=-33.42%2C-70.61&zoom=15')).toEqual({
      latitude: -33.42,
      longitude: -70.61,
    });
  });
});

/**
 * Airport code → display city name, used for hotel/rental searches and for
 * the itinerary prompt. Metropolitan codes (PAR, NYC, TYO...) map the same
 * way as single airports.
 */

const AIRPORT_TO_CITY: ReadonlyMap<string, string> = new Map([
  // Europe
  ['BCN', 'Barcelona, Spain'],
  ['MAD', 'Madrid, Spain'],
  ['PAR', 'Paris, France'],
  ['ROM', 'Rome, Italy'],
  ['AMS', 'Amsterdam, Netherlands'],
  ['BER', 'Berlin, Germany'],
  ['LIS', 'Lisbon, Portugal'],
  ['DUB', 'Dublin, Ireland'],
  ['VIE', 'Vienna, Austria'],
  ['PRG', 'Prague, Czech Republic'],

  // USA
  ['NYC', 'New York, USA'],
  ['LAX', 'Los Angeles, USA'],
  ['MIA', 'Miami, USA'],
  ['SFO', 'San Francisco, USA'],
  ['LAS', 'Las Vegas, USA'],

  // Asia & Middle East
  ['DXB', 'Dubai, UAE'],
  ['BKK', 'Bangkok, Thailand'],
  ['SIN', 'Singapore'],
  ['TYO', 'Tokyo, Japan'],
  ['HKG', 'Hong Kong'],

  // UK
  ['LHR', 'London, UK'],
  ['LGW', 'London, UK'],
  ['STN', 'London, UK'],
  ['LTN', 'London, UK'],
  ['LCY', 'London, UK'],
  ['MAN', 'Manchester, UK'],
  ['BHX', 'Birmingham, UK'],
  ['EDI', 'Edinburgh, UK'],
  ['GLA', 'Glasgow, UK'],
  ['BRS', 'Bristol, UK'],
  ['NCL', 'Newcastle, UK'],
  ['LPL', 'Liverpool, UK'],
]);

function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function resolveCity(code: string): string {
  return AIRPORT_TO_CITY.get(normalizeCode(code)) ?? code;
}

export function isKnownAirport(code: string): boolean {
  return AIRPORT_TO_CITY.has(normalizeCode(code));
}

/**
 * Flight search, date sweep and "best value" ranking.
 */

import { z } from "zod";
import type { SearchProvider } from "../../core/contracts";
import type { FlightOffer, Layover } from "@shared/types";
import { errorMessage } from "@shared/errors";
import { addDays } from "./utils/date";
import { unlimited, type Limiter } from "./utils/concurrency";
import { validItems } from "./utils/schema";

export const OFFERS_PER_SEARCH = 3;
export const DEFAULT_SWEEP_DAYS = 7;
export const MAX_BEST_VALUE_FLIGHTS = 8;
export const GOOD_VALUE_RATIO = 1.2;

// ============ Upstream payload (google_flights) ============
// Every leaf is optional and falls back to undefined on a type mismatch, so a
// partially broken offer still normalizes with placeholders. A broken leg
// reads as an empty one so the outbound/return positions hold; an offer that
// is not an object at all is dropped on its own.

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

const airportSchema = z.object({
  id: optionalString,
  time: optionalString,
}).passthrough();

const legSchema = z.object({
  departure_airport: airportSchema.optional().catch(undefined),
  arrival_airport: airportSchema.optional().catch(undefined),
  duration: optionalNumber,
  airline: optionalString,
  airline_logo: optionalString,
}).passthrough();

const layoverSchema = z.object({
  name: optionalString,
  id: optionalString,
  duration: optionalNumber,
}).passthrough();

const offerSchema = z.object({
  flights: z.array(legSchema.catch({})).default([]).catch([]),
  layovers: validItems(layoverSchema).catch([]),
  price: optionalNumber,
  total_duration: optionalNumber,
}).passthrough();

const flightSearchResponseSchema = z.object({
  best_flights: validItems(offerSchema),
  other_flights: validItems(offerSchema),
}).passthrough();

export type RawFlightOffer = z.infer<typeof offerSchema>;

// ============ Types ============

export interface FlightSearchParams {
  origin: string;
  destination: string;
  outboundDate: string;
  returnDate?: string | null;
}

export interface DateSweepParams extends FlightSearchParams {
  days?: number;
}

export interface FlightSearchContext {
  currency: string;
  language: string;
  signal?: AbortSignal;
  limit?: Limiter;
}

// ============ Flight Search Client ============

/** One upstream search; rejects on transport errors and malformed payloads. */
export async function searchFlights(
  provider: SearchProvider,
  params: FlightSearchParams,
  context: FlightSearchContext
): Promise<RawFlightOffer[]> {
  const query: Record<string, string> = {
    departure_id: params.origin,
    arrival_id: params.destination,
    outbound_date: params.outboundDate,
    currency: context.currency,
    hl: context.language,
    type: params.returnDate ? '1' : '2',
  };
  if (params.returnDate) {
    query.return_date = params.returnDate;
  }

  const data = await provider.search('google_flights', query, { signal: context.signal });
  const parsed = flightSearchResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Malformed flight search response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  return [...parsed.data.best_flights, ...parsed.data.other_flights];
}

export function buildBookingLink(origin: string, destination: string, date: string): string {
  const q = [origin, 'to', destination, 'on', date].map(encodeURIComponent).join('+');
  return `https://www.google.com/travel/flights?q=${q}`;
}

function normalizeLayover(layover: z.infer<typeof layoverSchema>): Layover {
  return {
    name: layover.name ?? '',
    id: layover.id ?? '',
    duration: layover.duration ?? null,
  };
}

export function normalizeFlightOffer(offer: RawFlightOffer, params: FlightSearchParams): FlightOffer {
  const [outbound, inbound] = offer.flights;

  return {
    outbound_date: params.outboundDate,
    return_date: params.returnDate ?? null,
    price: offer.price ?? null,
    total_duration: offer.total_duration ?? null,
    airline: outbound?.airline ?? 'Unknown',
    airline_logo: outbound?.airline_logo ?? '',

    outbound_departure_time: outbound?.departure_airport?.time ?? '',
    outbound_arrival_time: outbound?.arrival_airport?.time ?? '',
    outbound_departure_airport: outbound?.departure_airport?.id ?? params.origin,
    outbound_arrival_airport: outbound?.arrival_airport?.id ?? params.destination,
    outbound_duration: outbound?.duration ?? null,

    return_departure_time: inbound?.departure_airport?.time ?? '',
    return_arrival_time: inbound?.arrival_airport?.time ?? '',
    return_duration: inbound?.duration ?? null,

    booking_link: buildBookingLink(params.origin, params.destination, params.outboundDate),
    layovers: offer.layovers.map(normalizeLayover),
  };
}

// ============ Date-Sweep Aggregator ============

/**
 * Searches `days` consecutive departure dates (shifting the return date by the
 * same offset). A failed offset contributes nothing; the sweep never rejects.
 * Output order is offset, then upstream rank.
 */
export async function sweepFlightDates(
  provider: SearchProvider,
  params: DateSweepParams,
  context: FlightSearchContext
): Promise<FlightOffer[]> {
  const days = params.days ?? DEFAULT_SWEEP_DAYS;
  const limit = context.limit ?? unlimited;

  const searches = Array.from({ length: days }, (_, offset) => limit(async () => {
    try {
      const searchParams: FlightSearchParams = {
        origin: params.origin,
        destination: params.destination,
        outboundDate: addDays(params.outboundDate, offset),
        returnDate: params.returnDate ? addDays(params.returnDate, offset) : null,
      };
      const offers = await searchFlights(provider, searchParams, context);
      const top = offers.slice(0, OFFERS_PER_SEARCH).map(offer => normalizeFlightOffer(offer, searchParams));
      console.log(`[FlightSweep] ${params.origin}→${params.destination} ${searchParams.outboundDate}: ${top.length} offers`);
      return top;
    } catch (error) {
      console.error(`[FlightSweep] Search failed at offset +${offset}d:`, errorMessage(error));
      return [];
    }
  }));

  const results = await Promise.all(searches);
  return results.flat();
}

// ============ Value Ranking ============

function hasPrice(offer: FlightOffer): offer is FlightOffer & { price: number } {
  return typeof offer.price === 'number' && Number.isFinite(offer.price);
}

/**
 * Offers priced at most 20% above the mean known price, cheapest first.
 * Offers without a price never qualify.
 */
export function findBestValueFlights(
  offers: FlightOffer[],
  limit = MAX_BEST_VALUE_FLIGHTS
): FlightOffer[] {
  const priced = offers.filter(hasPrice);
  if (priced.length === 0) return [];

  const mean = priced.reduce((sum, offer) => sum + offer.price, 0) / priced.length;
  const threshold = mean * GOOD_VALUE_RATIO;

  return priced
    .filter(offer => offer.price <= threshold)
    .sort((a, b) => a.price - b.price)
    .slice(0, limit);
}

import type { SearchProvider, TextGenerator } from "../../core/contracts";
import { DEFAULT_DURATION_DAYS, MAX_DURATION_DAYS, type TripRequest } from "@shared/schema";
import type { HotelOption, RentalOption, TripPlanResponse } from "@shared/types";
import { errorMessage } from "@shared/errors";
import type { AppConfig } from "../config";
import { isKnownAirport, resolveCity } from "../lib/airports";
import { findBestValueFlights, sweepFlightDates } from "../lib/flights";
import { searchHotels, searchRentals, summarizeLodging } from "../lib/lodging";
import { runItineraryMachine } from "../lib/itineraryGenerator";
import { createLimiter } from "../lib/utils/concurrency";
import { addDays, daysBetween } from "../lib/utils/date";

export type PlannerConfig = Pick<
  AppConfig,
  'CURRENCY' | 'SEARCH_LANGUAGE' | 'SEARCH_COUNTRY' | 'UPSTREAM_CONCURRENCY' | 'DATE_SWEEP_DAYS' | 'MAX_OUTPUT_TOKENS'
>;

export interface TravelPlannerDeps {
  search: SearchProvider;
  generator: TextGenerator;
  config: PlannerConfig;
}

export interface PlanOptions {
  signal?: AbortSignal;
}

export interface TripDates {
  outboundDate: string;
  returnDate: string;
  durationDays: number;
}

/**
 * Explicit return date wins; otherwise `duration_days` (or the default) and a
 * return date synthesized from it. A return date on or before the outbound
 * date gives a zero or negative duration; only the rental search rejects it.
 */
export function resolveTripDates(request: TripRequest): TripDates {
  if (request.return_date) {
    return {
      outboundDate: request.outbound_date,
      returnDate: request.return_date,
      durationDays: daysBetween(request.outbound_date, request.return_date),
    };
  }

  const durationDays = request.duration_days ?? DEFAULT_DURATION_DAYS;
  return {
    outboundDate: request.outbound_date,
    returnDate: addDays(request.outbound_date, durationDays),
    durationDays,
  };
}

async function settle<T>(label: string, task: Promise<T>, fallback: T): Promise<T> {
  try {
    return await task;
  } catch (error) {
    console.error(`[TravelPlanner] ${label} failed:`, errorMessage(error));
    return fallback;
  }
}

/** Days to plan in the itinerary: the trip duration clamped to 1..30. */
export function itineraryDayCount(durationDays: number): number {
  return Math.min(Math.max(durationDays, 1), MAX_DURATION_DAYS);
}

export class TravelPlanner {
  constructor(private readonly deps: TravelPlannerDeps) {}

  async planTrip(request: TripRequest, options: PlanOptions = {}): Promise<TripPlanResponse> {
    const { search, generator, config } = this.deps;
    const { signal } = options;
    const city = resolveCity(request.destination);
    if (!isKnownAirport(request.destination)) {
      console.warn(`[TravelPlanner] Unknown airport code ${request.destination}, using it as the city name`);
    }
    const { outboundDate, returnDate, durationDays } = resolveTripDates(request);
    const wantsHotels = request.accommodation_type === 'hotel' || request.accommodation_type === 'mixed';
    const wantsRentals = request.accommodation_type === 'airbnb' || request.accommodation_type === 'mixed';

    console.log(`[TravelPlanner] ${request.origin} → ${request.destination} (${city}), ${outboundDate} – ${returnDate}, ${durationDays} days, budget ${request.budget} ${config.CURRENCY}`);

    // One limiter for the whole fan-out: the date sweep and both lodging searches.
    const limit = createLimiter(config.UPSTREAM_CONCURRENCY);
    const lodgingContext = {
      currency: config.CURRENCY,
      language: config.SEARCH_LANGUAGE,
      country: config.SEARCH_COUNTRY,
      signal,
    };
    const stay = { city, checkIn: outboundDate, checkOut: returnDate };

    const [allFlights, hotelOptions, rentalOptions] = await Promise.all([
      settle('Flight sweep', sweepFlightDates(search, {
        origin: request.origin,
        destination: request.destination,
        outboundDate,
        returnDate,
        days: config.DATE_SWEEP_DAYS,
      }, {
        currency: config.CURRENCY,
        language: config.SEARCH_LANGUAGE,
        signal,
        limit,
      }), []),
      wantsHotels
        ? settle<HotelOption[]>('Hotel search', limit(() => searchHotels(search, stay, lodgingContext)), [])
        : Promise.resolve<HotelOption[]>([]),
      wantsRentals
        ? settle<RentalOption[]>('Rental search', limit(() => searchRentals(search, stay, { signal })), [])
        : Promise.resolve<RentalOption[]>([]),
    ]);

    const flightOptions = findBestValueFlights(allFlights);
    console.log(`[TravelPlanner] ${flightOptions.length} best-value flights out of ${allFlights.length}`);

    const recommendedFlightCost = flightOptions[0]?.price ?? 0;
    // Not clamped; may be negative.
    const remainingBudget = request.budget - recommendedFlightCost;

    const { itinerary, outcome } = await runItineraryMachine({
      city,
      days: itineraryDayCount(durationDays),
      keywords: request.keywords,
      budget: remainingBudget,
      currency: config.CURRENCY,
      lodging: summarizeLodging([...hotelOptions, ...rentalOptions], config.CURRENCY),
    }, {
      generator,
      maxOutputTokens: config.MAX_OUTPUT_TOKENS,
      signal,
    });

    console.log(`[TravelPlanner] Plan ready for ${city}: itinerary ${outcome}, ${hotelOptions.length} hotels, ${rentalOptions.length} rentals`);

    return {
      destination: city,
      destination_code: request.destination,
      origin: request.origin,
      keywords: request.keywords,
      total_budget: request.budget,
      trip_duration: durationDays,
      outbound_date: outboundDate,
      return_date: returnDate,
      flight_options: flightOptions,
      recommended_flight_cost: recommendedFlightCost,
      hotel_options: hotelOptions,
      airbnb_options: rentalOptions,
      accommodation_type: request.accommodation_type,
      remaining_budget: remainingBudget,
      itinerary,
    };
  }
}

/**
 * Accommodation search: structured hotel results and rental listings
 * scraped from general web search.
 */

import { z } from "zod";
import type { SearchProvider } from "../../core/contracts";
import { NOT_AVAILABLE, type HotelOption, type LodgingOption, type RentalOption } from "@shared/types";
import { AppError, ErrorCode, errorMessage } from "@shared/errors";
import { daysBetween } from "./utils/date";
import { validItems } from "./utils/schema";

export const MAX_HOTEL_RESULTS = 10;
export const HOTEL_DESCRIPTION_LIMIT = 200;
export const HOTEL_IMAGE_LIMIT = 3;
export const HOTEL_AMENITY_LIMIT = 5;

export const RENTAL_PLATFORM = 'airbnb';
export const RENTAL_SCAN_LIMIT = 8;
// No price data on the web-search path: fixed estimates, not observed prices.
export const RENTAL_NIGHTLY_RANGE = '50-150';
export const RENTAL_NIGHTLY_ESTIMATE = 75;
export const RENTAL_PROPERTY_TYPE = 'Entire home/Private room';

// ============ Upstream payloads ============

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

const rateSchema = z.object({
  lowest: optionalString,
  extracted_lowest: optionalNumber,
}).passthrough();

const hotelImageSchema = z.object({
  thumbnail: optionalString,
  original_image: optionalString,
}).passthrough();

const hotelPropertySchema = z.object({
  name: optionalString,
  description: optionalString,
  link: optionalString,
  rate_per_night: rateSchema.optional().catch(undefined),
  total_rate: rateSchema.optional().catch(undefined),
  overall_rating: optionalNumber,
  reviews: optionalNumber,
  images: validItems(hotelImageSchema).catch([]),
  amenities: validItems(z.string()).catch([]),
}).passthrough();

const hotelSearchResponseSchema = z.object({
  properties: validItems(hotelPropertySchema),
}).passthrough();

const organicResultSchema = z.object({
  title: optionalString,
  link: optionalString,
  snippet: optionalString,
}).passthrough();

const webSearchResponseSchema = z.object({
  organic_results: validItems(organicResultSchema),
}).passthrough();

// ============ Types ============

export interface LodgingSearchParams {
  city: string;
  checkIn: string;
  checkOut: string;
}

export interface LodgingSearchContext {
  currency: string;
  language: string;
  country: string;
  signal?: AbortSignal;
}

// ============ Hotels ============

export function normalizeHotel(property: z.infer<typeof hotelPropertySchema>): HotelOption {
  const images = property.images
    .map(image => image.thumbnail ?? image.original_image)
    .filter((url): url is string => typeof url === 'string' && url.length > 0);

  return {
    type: 'hotel',
    name: property.name ?? NOT_AVAILABLE,
    price_per_night: property.rate_per_night?.extracted_lowest ?? NOT_AVAILABLE,
    total_price: property.total_rate?.extracted_lowest ?? NOT_AVAILABLE,
    rating: property.overall_rating ?? NOT_AVAILABLE,
    reviews: property.reviews ?? 0,
    link: property.link ?? '#',
    description: (property.description ?? '').slice(0, HOTEL_DESCRIPTION_LIMIT),
    images: images.slice(0, HOTEL_IMAGE_LIMIT),
    amenities: property.amenities.slice(0, HOTEL_AMENITY_LIMIT),
  };
}

export async function searchHotels(
  provider: SearchProvider,
  params: LodgingSearchParams,
  context: LodgingSearchContext
): Promise<HotelOption[]> {
  console.log(`[Hotels] Searching hotels for: ${params.city} (${params.checkIn} → ${params.checkOut})`);

  try {
    const data = await provider.search('google_hotels', {
      q: params.city,
      check_in_date: params.checkIn,
      check_out_date: params.checkOut,
      currency: context.currency,
      gl: context.country,
      hl: context.language,
    }, { signal: context.signal });

    const parsed = hotelSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`[Hotels] Malformed response for ${params.city}`);
      return [];
    }

    const hotels = parsed.data.properties.slice(0, MAX_HOTEL_RESULTS).map(normalizeHotel);
    console.log(`[Hotels] Found ${hotels.length} hotels in ${params.city}`);
    return hotels;
  } catch (error) {
    console.error(`[Hotels] Search error for ${params.city}:`, errorMessage(error));
    return [];
  }
}

// ============ Rentals ============

/** Whole nights between two ISO dates; throws unless check-out is after check-in. */
export function countNights(checkIn: string | null | undefined, checkOut: string | null | undefined): number {
  if (!checkIn || !checkOut) {
    throw new AppError(ErrorCode.INVALID_DATE_RANGE, 'Check-in and check-out dates are both required');
  }
  const nights = daysBetween(checkIn, checkOut);
  if (Number.isNaN(nights)) {
    throw new AppError(ErrorCode.INVALID_DATE_RANGE, `Invalid stay dates: ${checkIn} → ${checkOut}`);
  }
  if (nights <= 0) {
    throw new AppError(
      ErrorCode.INVALID_DATE_RANGE,
      `Check-out date (${checkOut}) must be after check-in date (${checkIn})`
    );
  }
  return nights;
}

export function isRentalListingLink(link: string): boolean {
  if (!URL.canParse(link)) return false;
  const { hostname } = new URL(link);
  return hostname.toLowerCase().split('.').includes(RENTAL_PLATFORM);
}

/**
 * Rental listings from web search. Rejects with INVALID_DATE_RANGE before
 * any upstream call when the stay dates are unusable; upstream failures
 * resolve to an empty list.
 */
export async function searchRentals(
  provider: SearchProvider,
  params: LodgingSearchParams,
  context: Pick<LodgingSearchContext, 'signal'>
): Promise<RentalOption[]> {
  const nights = countNights(params.checkIn, params.checkOut);
  console.log(`[Rentals] Searching ${RENTAL_PLATFORM} for: ${params.city} (${nights} nights)`);

  try {
    const data = await provider.search('google', {
      q: `${RENTAL_PLATFORM} ${params.city}`,
      num: '10',
    }, { signal: context.signal });

    const parsed = webSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`[Rentals] Malformed response for ${params.city}`);
      return [];
    }

    const listings: RentalOption[] = [];
    for (const result of parsed.data.organic_results.slice(0, RENTAL_SCAN_LIMIT)) {
      if (!result.link || !isRentalListingLink(result.link)) continue;
      listings.push({
        type: 'airbnb',
        name: result.title ?? 'Airbnb Listing',
        price_per_night: RENTAL_NIGHTLY_RANGE,
        total_price: String(nights * RENTAL_NIGHTLY_ESTIMATE),
        description: result.snippet ?? '',
        link: result.link,
        property_type: RENTAL_PROPERTY_TYPE,
      });
    }

    console.log(`[Rentals] Found ${listings.length} listings in ${params.city}`);
    return listings;
  } catch (error) {
    console.error(`[Rentals] Search error for ${params.city}:`, errorMessage(error));
    return [];
  }
}

// ============ Prompt digest ============

export function summarizeLodging(options: LodgingOption[], currency: string, limit = 3): string[] {
  return options.slice(0, limit).map(option => {
    const price = option.price_per_night === NOT_AVAILABLE
      ? NOT_AVAILABLE
      : `${option.price_per_night} ${currency}`;
    return `- ${option.name}: ${price}/night`;
  });
}

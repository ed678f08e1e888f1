import { z } from "zod";

// ============ Enums ============

export const ACCOMMODATION_TYPES = ['hotel', 'airbnb', 'mixed'] as const;
export type AccommodationType = (typeof ACCOMMODATION_TYPES)[number];

export const REQUIRED_TRIP_FIELDS = ['destination', 'origin', 'outbound_date'] as const;

export const DEFAULT_BUDGET = 1000;
export const DEFAULT_DURATION_DAYS = 5;
export const MAX_DURATION_DAYS = 30;

// ============ Field Schemas ============

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export const isoDateSchema = z.string()
  .trim()
  .regex(ISO_DATE_PATTERN, "Date must be in YYYY-MM-DD format")
  .refine(isCalendarDate, "Date is not a valid calendar date");

const airportCodeSchema = z.string()
  .trim()
  .min(1, "Airport code cannot be empty")
  .max(8, "Airport code is too long")
  .transform(code => code.toUpperCase());

// ============ Trip Request ============

export const tripRequestSchema = z.object({
  destination: airportCodeSchema,
  origin: airportCodeSchema,
  outbound_date: isoDateSchema,
  return_date: isoDateSchema.nullish(),
  duration_days: z.number().int().min(1).max(MAX_DURATION_DAYS).nullish(),
  budget: z.number().finite().default(DEFAULT_BUDGET),
  keywords: z.array(z.string().trim().min(1)).default([]),
  accommodation_type: z.enum(ACCOMMODATION_TYPES).default('hotel'),
});

export type TripRequestInput = z.input<typeof tripRequestSchema>;
export type TripRequest = z.output<typeof tripRequestSchema>;

/**
 * Names of required fields that are absent, null or blank in a raw body.
 * Runs before schema parsing so that a missing field is reported as such
 * rather than as a type error.
 */
export function findMissingTripFields(body: unknown): string[] {
  const record = typeof body === 'object' && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {};
  return REQUIRED_TRIP_FIELDS.filter(field => {
    const value = record[field];
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
  });
}

// ============ Itinerary Sections ============
// Lenient: a generated document only has to carry these sections in the
// right container shape, the entries themselves are passed through.

export const restaurantSetSchema = z.object({
  breakfast: z.array(z.unknown()).min(1),
  lunch: z.array(z.unknown()).min(1),
  dinner: z.array(z.unknown()).min(1),
}).passthrough();

export const dailyItinerarySchema = z.array(z.unknown()).min(1);

export const overviewSchema = z.object({}).passthrough();

export const budgetSummarySchema = z.object({}).passthrough();

export const itineraryDocumentSchema = z.object({
  overview: overviewSchema,
  daily_itinerary: dailyItinerarySchema,
  restaurants: restaurantSetSchema,
  budget_summary: budgetSummarySchema,
}).passthrough();

export type ItineraryDocument = z.infer<typeof itineraryDocumentSchema>;

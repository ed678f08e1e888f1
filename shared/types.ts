import type { AccommodationType, ItineraryDocument } from "./schema";

export const NOT_AVAILABLE = 'N/A';
export type NotAvailable = typeof NOT_AVAILABLE;

// ============ Flights ============

export interface Layover {
  name: string;
  id: string;
  duration: number | null;
}

export interface FlightOffer {
  outbound_date: string;
  return_date: string | null;
  price: number | null;
  total_duration: number | null;
  airline: string;
  airline_logo: string;

  outbound_departure_time: string;
  outbound_arrival_time: string;
  outbound_departure_airport: string;
  outbound_arrival_airport: string;
  outbound_duration: number | null;

  return_departure_time: string;
  return_arrival_time: string;
  return_duration: number | null;

  booking_link: string;
  layovers: Layover[];
}

// ============ Lodging ============

export interface HotelOption {
  type: 'hotel';
  name: string;
  price_per_night: number | NotAvailable;
  total_price: number | NotAvailable;
  rating: number | NotAvailable;
  reviews: number;
  link: string;
  description: string;
  images: string[];
  amenities: string[];
}

export interface RentalOption {
  type: 'airbnb';
  name: string;
  /** Heuristic range, not a quoted price. */
  price_per_night: string;
  /** nights × fixed nightly estimate. */
  total_price: string;
  description: string;
  link: string;
  property_type: string;
}

export type LodgingOption = HotelOption | RentalOption;

// ============ Itinerary ============

export type ItineraryOverview = {
  destination: string;
  best_time_to_visit: string;
  getting_around: string;
  money_saving_tips: string[];
  local_customs: string;
};

export interface ActivityBlock {
  time: string;
  activity: string;
  description: string;
  cost: number;
  duration: string;
  location: string;
}

export interface DayPlan {
  day: number;
  theme: string;
  morning: ActivityBlock;
  afternoon: ActivityBlock;
  evening: ActivityBlock;
  daily_total: number;
}

export interface RestaurantPick {
  name: string;
  cuisine: string;
  price_per_person: number;
  rating: number;
  description: string;
  neighborhood: string;
  signature_dish: string;
}

export type RestaurantSet = {
  breakfast: RestaurantPick[];
  lunch: RestaurantPick[];
  dinner: RestaurantPick[];
};

export type BudgetSummary = {
  activities: number;
  food: number;
  transport: number;
  accommodation_estimate: number;
  total_estimate: number;
};

export type ItineraryPlan = {
  overview: ItineraryOverview;
  daily_itinerary: DayPlan[];
  restaurants: RestaurantSet;
  budget_summary: BudgetSummary;
};

export type ItinerarySection = keyof ItineraryPlan;

/**
 * A generated itinerary. The four sections are guaranteed present in the
 * expected container shape; whatever else the model returned rides along.
 */
export type { ItineraryDocument };

// ============ Response ============

export interface TripPlanResponse {
  destination: string;
  destination_code: string;
  origin: string;
  keywords: string[];
  total_budget: number;
  trip_duration: number;
  outbound_date: string;
  return_date: string;
  flight_options: FlightOffer[];
  recommended_flight_cost: number;
  hotel_options: HotelOption[];
  airbnb_options: RentalOption[];
  accommodation_type: AccommodationType;
  remaining_budget: number;
  itinerary: ItineraryDocument;
}

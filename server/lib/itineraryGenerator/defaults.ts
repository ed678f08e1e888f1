/**
 * Itinerary Generator - Synthetic content used for repair and fallback
 */

import type {
  BudgetSummary,
  DayPlan,
  ItineraryOverview,
  ItineraryPlan,
  RestaurantSet,
} from "@shared/types";

export function buildDefaultOverview(city: string): ItineraryOverview {
  return {
    destination: city,
    best_time_to_visit: "Year-round",
    getting_around: "Public transport and walking",
    money_saving_tips: ["Use public transport", "Book attractions online", "Eat at local spots"],
    local_customs: "Respect local customs and traditions",
  };
}

export function buildDefaultDailyItinerary(city: string, days: number): DayPlan[] {
  return Array.from({ length: days }, (_, index) => {
    const day = index + 1;
    return {
      day,
      theme: `Day ${day} Exploration`,
      morning: {
        time: "9:00 AM",
        activity: "Morning Activity",
        description: `Explore ${city} in the morning`,
        cost: 15,
        duration: "2-3 hours",
        location: "City Center",
      },
      afternoon: {
        time: "2:00 PM",
        activity: "Afternoon Activity",
        description: "Continue exploration",
        cost: 25,
        duration: "3-4 hours",
        location: "Main attractions",
      },
      evening: {
        time: "7:00 PM",
        activity: "Evening Activity",
        description: "Evening entertainment",
        cost: 30,
        duration: "2-3 hours",
        location: "Entertainment district",
      },
      daily_total: 70,
    };
  });
}

export function buildDefaultRestaurants(city: string): RestaurantSet {
  return {
    breakfast: [
      {
        name: `${city} Breakfast Café`,
        cuisine: "Local",
        price_per_person: 12,
        rating: 4.5,
        description: "Popular local breakfast spot",
        neighborhood: "City Center",
        signature_dish: "Traditional breakfast",
      },
      {
        name: "Morning Bistro",
        cuisine: "Café",
        price_per_person: 10,
        rating: 4.3,
        description: "Cozy breakfast place",
        neighborhood: "Old Town",
        signature_dish: "Fresh pastries",
      },
      {
        name: "Early Bird Café",
        cuisine: "International",
        price_per_person: 14,
        rating: 4.4,
        description: "Great morning coffee and food",
        neighborhood: "Downtown",
        signature_dish: "Avocado toast",
      },
    ],
    lunch: [
      {
        name: `${city} Lunch Spot`,
        cuisine: "Local",
        price_per_person: 18,
        rating: 4.6,
        description: "Great lunch location",
        neighborhood: "City Center",
        signature_dish: "Local specialties",
      },
      {
        name: "Lunch Bistro",
        cuisine: "International",
        price_per_person: 20,
        rating: 4.4,
        description: "Popular lunch venue",
        neighborhood: "Downtown",
        signature_dish: "Daily specials",
      },
      {
        name: "Midday Kitchen",
        cuisine: "Mediterranean",
        price_per_person: 22,
        rating: 4.5,
        description: "Fresh lunch options",
        neighborhood: "Harbor",
        signature_dish: "Grilled fish",
      },
    ],
    dinner: [
      {
        name: `${city} Fine Dining`,
        cuisine: "Fine Dining",
        price_per_person: 45,
        rating: 4.8,
        description: "Upscale dinner experience",
        neighborhood: "City Center",
        signature_dish: "Chef's tasting menu",
      },
      {
        name: "Evening Restaurant",
        cuisine: "Local",
        price_per_person: 35,
        rating: 4.7,
        description: "Traditional dinner spot",
        neighborhood: "Old Town",
        signature_dish: "Regional dishes",
      },
      {
        name: "Night Table",
        cuisine: "Contemporary",
        price_per_person: 40,
        rating: 4.6,
        description: "Modern cuisine",
        neighborhood: "Arts District",
        signature_dish: "Seasonal menu",
      },
    ],
  };
}

export function buildDefaultBudgetSummary(): BudgetSummary {
  return {
    activities: 200,
    food: 300,
    transport: 50,
    accommodation_estimate: 400,
    total_estimate: 950,
  };
}

export function buildFallbackItinerary(city: string, days: number): ItineraryPlan {
  return {
    overview: buildDefaultOverview(city),
    daily_itinerary: buildDefaultDailyItinerary(city, days),
    restaurants: buildDefaultRestaurants(city),
    budget_summary: buildDefaultBudgetSummary(),
  };
}

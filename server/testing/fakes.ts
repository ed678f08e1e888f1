import type {
  GenerateTextOptions,
  SearchEngine,
  SearchProvider,
  TextGenerator,
  UpstreamCallOptions,
} from "../../core/contracts";
import type { ItineraryPlan } from "@shared/types";

type SearchHandler = (params: Record<string, string>, options: UpstreamCallOptions) => unknown;

export interface SearchCall {
  engine: SearchEngine;
  params: Record<string, string>;
}

/** In-memory SearchProvider; an engine without a handler rejects. */
export function createFakeSearch(handlers: Partial<Record<SearchEngine, SearchHandler>>) {
  const calls: SearchCall[] = [];

  const provider: SearchProvider = {
    configured: true,
    async search(engine, params, options = {}) {
      calls.push({ engine, params });
      const handler = handlers[engine];
      if (!handler) {
        throw new Error(`No fake handler for ${engine}`);
      }
      return handler(params, options);
    },
  };

  return { provider, calls };
}

export interface GenerateCall {
  prompt: string;
  options: GenerateTextOptions;
}

export function createFakeGenerator(respond: (prompt: string) => string) {
  const calls: GenerateCall[] = [];

  const generator: TextGenerator = {
    configured: true,
    async generate(prompt, options) {
      calls.push({ prompt, options });
      return respond(prompt);
    },
  };

  return { generator, calls };
}

export function flightsPayload(prices: Array<number | undefined>, airline = 'Test Air') {
  return {
    best_flights: prices.map(price => ({
      flights: [
        {
          departure_airport: { id: 'LHR', time: '2025-03-01 08:00' },
          arrival_airport: { id: 'BCN', time: '2025-03-01 11:10' },
          duration: 130,
          airline,
          airline_logo: 'https://img.example/logo.png',
        },
      ],
      layovers: [],
      price,
      total_duration: 130,
    })),
  };
}

export function sampleItinerary(days: number): ItineraryPlan {
  const block = {
    time: '10:00 AM',
    activity: 'Walking tour',
    description: 'Old town walk',
    cost: 20,
    duration: '2 hours',
    location: 'Gothic Quarter',
  };
  const pick = {
    name: 'Cafe Uno',
    cuisine: 'Catalan',
    price_per_person: 15,
    rating: 4.6,
    description: 'Locals love it',
    neighborhood: 'Gracia',
    signature_dish: 'Pan con tomate',
  };

  return {
    overview: {
      destination: 'Barcelona, Spain',
      best_time_to_visit: 'May to June',
      getting_around: 'Metro',
      money_saving_tips: ['Buy a T-casual card'],
      local_customs: 'Late dinners',
    },
    daily_itinerary: Array.from({ length: days }, (_, index) => ({
      day: index + 1,
      theme: 'Architecture',
      morning: block,
      afternoon: block,
      evening: block,
      daily_total: 60,
    })),
    restaurants: { breakfast: [pick], lunch: [pick], dinner: [pick] },
    budget_summary: {
      activities: 120,
      food: 200,
      transport: 30,
      accommodation_estimate: 500,
      total_estimate: 850,
    },
  };
}

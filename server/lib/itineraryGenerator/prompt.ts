/**
 * Itinerary Generator - Prompt composition
 */

export interface ItineraryRequest {
  city: string;
  days: number;
  keywords: string[];
  /** Remaining budget after flights. Passed through even when negative. */
  budget: number;
  currency: string;
  /** Digest lines of the top lodging picks, e.g. "- Hotel Arts: 180 GBP/night". */
  lodging: string[];
}

export function buildItineraryPrompt(request: ItineraryRequest): string {
  const { city, days, keywords, budget, currency, lodging } = request;

  const interests = keywords.length > 0 ? keywords.join(', ') : 'general sightseeing';
  const lodgingInfo = lodging.length > 0
    ? `\nTop accommodation picks:\n${lodging.join('\n')}\n`
    : '';

  return `Create a ${days}-day itinerary for ${city}.

CRITICAL: You MUST respond with ONLY valid JSON. No other text before or after.

Required JSON structure:
{
  "overview": {
    "destination": "${city}",
    "best_time_to_visit": "Best months to visit",
    "getting_around": "How to get around the city",
    "money_saving_tips": ["tip 1", "tip 2", "tip 3"],
    "local_customs": "Important cultural customs"
  },
  "daily_itinerary": [
    {
      "day": 1,
      "theme": "Cultural Exploration",
      "morning": { "time": "9:00 AM", "activity": "Activity name", "description": "Detailed description", "cost": 15, "duration": "2 hours", "location": "Neighborhood name" },
      "afternoon": { "time": "2:00 PM", "activity": "Activity name", "description": "Detailed description", "cost": 25, "duration": "3 hours", "location": "Neighborhood name" },
      "evening": { "time": "7:00 PM", "activity": "Activity name", "description": "Detailed description", "cost": 35, "duration": "2 hours", "location": "Neighborhood name" },
      "daily_total": 75
    }
  ],
  "restaurants": {
    "breakfast": [
      { "name": "Café Name", "cuisine": "French", "price_per_person": 12, "rating": 4.5, "description": "Why to visit", "neighborhood": "Area name", "signature_dish": "Famous dish" }
    ],
    "lunch": [
      { "name": "Restaurant Name", "cuisine": "Italian", "price_per_person": 18, "rating": 4.6, "description": "Why to visit", "neighborhood": "Area name", "signature_dish": "Famous dish" }
    ],
    "dinner": [
      { "name": "Restaurant Name", "cuisine": "Local", "price_per_person": 35, "rating": 4.7, "description": "Why to visit", "neighborhood": "Area name", "signature_dish": "Famous dish" }
    ]
  },
  "budget_summary": {
    "activities": 200,
    "food": 300,
    "transport": 50,
    "accommodation_estimate": 400,
    "total_estimate": 950
  }
}

Requirements:
- Include exactly ${days} days in daily_itinerary
- Include 5-6 restaurants for EACH meal type (breakfast, lunch, dinner)
- Realistic prices in ${currency}
- Star ratings between 4.0-5.0
- User interests: ${interests}
- Budget: ${budget} ${currency}
${lodgingInfo}
IMPORTANT: Respond ONLY with the JSON object. No markdown, no code blocks, no other text.`;
}

import { Router } from 'express';
import type { SearchProvider, TextGenerator } from '../../core/contracts';
import type { TravelPlanner } from '../services/travelPlanner';
import { createRateLimiter } from '../middleware/rateLimit';
import { createHealthRouter } from './health';
import { createItineraryRouter } from './itinerary';

export interface ApiRouterDeps {
  planner: Pick<TravelPlanner, 'planTrip'>;
  search: SearchProvider;
  generator: TextGenerator;
  planRequestsPerMinute: number;
}

export function createApiRouter(deps: ApiRouterDeps) {
  const router = Router();

  const planRateLimiter = createRateLimiter({
    windowMs: 60000,
    maxRequests: deps.planRequestsPerMinute,
    message: 'Too many trip plans requested, please try again later',
  });

  router.use('/', createHealthRouter(deps.search, deps.generator));
  router.use('/', createItineraryRouter(deps.planner, planRateLimiter));

  return router;
}

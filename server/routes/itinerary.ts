import { Router, type RequestHandler } from "express";
import { findMissingTripFields, tripRequestSchema } from "@shared/schema";
import { ErrorCode, createErrorResponse } from "@shared/errors";
import type { TravelPlanner } from "../services/travelPlanner";

export function createItineraryRouter(
  planner: Pick<TravelPlanner, 'planTrip'>,
  rateLimiter: RequestHandler
) {
  const router = Router();

  router.post('/itinerary', rateLimiter, async (req, res, next) => {
    const missing = findMissingTripFields(req.body);
    if (missing.length > 0) {
      console.log(`[Itinerary] Rejected request, missing: ${missing.join(', ')}`);
      return res.status(400).json(createErrorResponse(ErrorCode.MISSING_REQUIRED_FIELD, undefined, { fields: missing }));
    }

    const parsed = tripRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json(createErrorResponse(ErrorCode.VALIDATION_ERROR, undefined, { issues: parsed.error.errors }));
    }

    // Abandon in-flight upstream calls if the client goes away first.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const plan = await planner.planTrip(parsed.data, { signal: controller.signal });
      res.json(plan);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

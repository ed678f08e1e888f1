import { Router } from "express";
import type { SearchProvider, TextGenerator } from "../../core/contracts";

export function createHealthRouter(search: SearchProvider, generator: TextGenerator) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      providers: {
        search: search.configured,
        generation: generator.configured,
      },
    });
  });

  return router;
}

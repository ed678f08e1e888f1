import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import type { SearchProvider, TextGenerator } from "../core/contracts";
import { ErrorCode, createErrorResponse, isAppError } from "@shared/errors";
import type { AppConfig } from "./config";
import { requestLogger } from "./middleware/requestLogger";
import { createApiRouter } from "./routes";
import { TravelPlanner } from "./services/travelPlanner";
import { serveStatic } from "./static";

export interface AppDeps {
  config: AppConfig;
  search: SearchProvider;
  generator: TextGenerator;
}

export function createApp({ config, search, generator }: AppDeps) {
  const app = express();

  // ============================================================
  // 1. Body parser and CORS
  // ============================================================
  app.use(express.json({ limit: '100kb' }));

  const allowAnyOrigin = config.NODE_ENV !== 'production' || config.CORS_ORIGINS.length === 0;
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || allowAnyOrigin) return callback(null, true);
      if (config.CORS_ORIGINS.includes(origin)) return callback(null, true);
      callback(new Error('Not allowed by CORS'));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  app.use(requestLogger);

  // ============================================================
  // 2. API routes
  // ============================================================
  const planner = new TravelPlanner({ search, generator, config });
  app.use('/api', createApiRouter({
    planner,
    search,
    generator,
    planRequestsPerMinute: config.PLAN_RATE_LIMIT_PER_MINUTE,
  }));

  // API 404 fallback - unknown API routes get JSON, not the landing page
  app.use('/api', (req, res) => {
    res.status(404).json(createErrorResponse(ErrorCode.NOT_FOUND, 'API endpoint not found', { path: req.originalUrl }));
  });

  // ============================================================
  // 3. Landing page
  // ============================================================
  serveStatic(app);

  // ============================================================
  // 4. Error handling
  // ============================================================
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(err)) {
      console.error(`[Express Error] ${req.method} ${req.path}: ${err.code} ${err.message}`);
      return res.status(err.status).json(createErrorResponse(err.code, err.message));
    }
    // body-parser errors carry an HTTP status (400 for malformed JSON, 413 for size)
    const status = hasStatus(err) ? err.status : 500;
    const message = status < 500 && err instanceof Error ? err.message : "Internal Server Error";
    console.error(`[Express Error] ${req.method} ${req.path}:`, err instanceof Error ? err.stack || err.message : err);
    res.status(status).json({ message });
  });

  return app;
}

function hasStatus(err: unknown): err is { status: number } {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

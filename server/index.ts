import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { GeminiTextGenerator } from "./lib/gemini";
import { SerpApiClient } from "./lib/serpApi";
import { log } from "./log";

async function startServer() {
  const config = loadConfig();

  const search = new SerpApiClient({
    apiKey: config.SERPAPI_KEY,
    baseUrl: config.SERPAPI_BASE_URL,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS,
  });
  const generator = new GeminiTextGenerator({
    apiKey: config.GEMINI_API_KEY,
    model: config.GEMINI_MODEL,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS,
  });

  if (!search.configured) {
    console.warn('[Startup] SERPAPI_KEY not set, flight and lodging searches will return empty results');
  }
  if (!generator.configured) {
    console.warn('[Startup] GEMINI_API_KEY not set, itineraries will use the fallback template');
  }

  const app = createApp({ config, search, generator });
  const httpServer = createServer(app);

  httpServer.listen({ port: config.PORT, host: "0.0.0.0" }, () => {
    log(`Server is running on port ${config.PORT}`);
  });
}

startServer().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});

import { z } from "zod";
import type { SearchEngine, SearchProvider, UpstreamCallOptions } from "../../core/contracts";
import { AppError, ErrorCode } from "@shared/errors";
import { upstreamSignal } from "./utils/concurrency";

const apiErrorSchema = z.object({ error: z.string() });

export interface SerpApiOptions {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * SerpApi search client. One HTTP GET per call; the caller decides what an
 * empty or failed result means.
 */
export class SerpApiClient implements SearchProvider {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SerpApiOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async search(
    engine: SearchEngine,
    params: Record<string, string>,
    options: UpstreamCallOptions = {}
  ): Promise<unknown> {
    if (!this.apiKey) {
      throw new AppError(ErrorCode.UPSTREAM_NOT_CONFIGURED, "SerpApi key not configured");
    }

    const url = new URL(this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('engine', engine);
    url.searchParams.set('api_key', this.apiKey);

    const response = await this.fetchImpl(url, {
      headers: { 'Accept': 'application/json' },
      signal: upstreamSignal(this.timeoutMs, options.signal),
    });

    if (!response.ok) {
      throw new AppError(ErrorCode.UPSTREAM_ERROR, `SerpApi ${engine} failed: ${response.status}`);
    }

    const data: unknown = await response.json();
    const apiError = apiErrorSchema.safeParse(data);
    if (apiError.success) {
      throw new AppError(ErrorCode.UPSTREAM_ERROR, `SerpApi ${engine} error: ${apiError.data.error}`);
    }

    return data;
  }
}

export type SearchEngine = 'google_flights' | 'google_hotels' | 'google';

export interface UpstreamCallOptions {
  signal?: AbortSignal;
}

/**
 * Keyword/structured search provider. `search` resolves with the raw JSON
 * body of a successful call and rejects on transport, HTTP or API errors.
 */
export interface SearchProvider {
  readonly configured: boolean;
  search(
    engine: SearchEngine,
    params: Record<string, string>,
    options?: UpstreamCallOptions
  ): Promise<unknown>;
}

export interface GenerateTextOptions extends UpstreamCallOptions {
  maxOutputTokens: number;
  temperature?: number;
}

/** Prompt in, free text out. Rejects when the provider cannot answer. */
export interface TextGenerator {
  readonly configured: boolean;
  generate(prompt: string, options: GenerateTextOptions): Promise<string>;
}

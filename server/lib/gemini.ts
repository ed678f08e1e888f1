import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerateTextOptions, TextGenerator } from "../../core/contracts";
import { AppError, ErrorCode } from "@shared/errors";
import { upstreamSignal } from "./utils/concurrency";

export interface GeminiOptions {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

// ============ Gemini text generation (no retry) ============
export class GeminiTextGenerator implements TextGenerator {
  private readonly genAI: GoogleGenerativeAI | null;
  private readonly modelName: string;
  private readonly timeoutMs: number;

  constructor(options: GeminiOptions) {
    this.genAI = options.apiKey ? new GoogleGenerativeAI(options.apiKey) : null;
    this.modelName = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  get configured(): boolean {
    return this.genAI !== null;
  }

  async generate(prompt: string, options: GenerateTextOptions): Promise<string> {
    if (!this.genAI) {
      throw new AppError(ErrorCode.UPSTREAM_NOT_CONFIGURED, "Gemini API not configured");
    }

    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      generationConfig: {
        temperature: options.temperature ?? 0.7,
        maxOutputTokens: options.maxOutputTokens,
      },
    });

    const result = await model.generateContent(
      { contents: [{ role: "user", parts: [{ text: prompt }] }] },
      { signal: upstreamSignal(this.timeoutMs, options.signal) }
    );

    return result.response.text();
  }
}

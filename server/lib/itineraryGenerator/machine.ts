/**
 * Itinerary Generator - State machine
 *
 *   compose → request → parse → validate ─┬→ accept
 *                │          │             └→ repair
 *                └──────────┴──────────────→ fallback
 *
 * The model's output is untrusted free text. Whatever happens upstream, the
 * terminal state always carries a document with all four sections.
 */

import type { TextGenerator } from "../../../core/contracts";
import {
  budgetSummarySchema,
  dailyItinerarySchema,
  itineraryDocumentSchema,
  overviewSchema,
  restaurantSetSchema,
} from "@shared/schema";
import type { ItineraryDocument, ItinerarySection } from "@shared/types";
import { errorMessage } from "@shared/errors";
import { buildItineraryPrompt, type ItineraryRequest } from "./prompt";
import {
  buildDefaultBudgetSummary,
  buildDefaultDailyItinerary,
  buildDefaultOverview,
  buildDefaultRestaurants,
  buildFallbackItinerary,
} from "./defaults";

export type GenerationState =
  | { status: 'compose' }
  | { status: 'request'; prompt: string }
  | { status: 'parse'; text: string }
  | { status: 'validate'; document: Record<string, unknown> }
  | { status: 'accept'; document: ItineraryDocument }
  | { status: 'repair'; document: ItineraryDocument; repaired: ItinerarySection[] }
  | { status: 'fallback'; document: ItineraryDocument; reason: string };

export type TerminalState = Extract<GenerationState, { status: 'accept' | 'repair' | 'fallback' }>;

export type ItineraryOutcome = 'accepted' | 'repaired' | 'fallback';

export interface ItineraryResult {
  itinerary: ItineraryDocument;
  outcome: ItineraryOutcome;
  repaired: ItinerarySection[];
  reason?: string;
}

export interface MachineContext {
  generator: TextGenerator;
  maxOutputTokens: number;
  signal?: AbortSignal;
}

// ============ Parse ============

const CODE_FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)\s*(?:```|$)/i;

/** Content of the first ``` / ```json fence, or the trimmed text when unfenced. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(CODE_FENCE_PATTERN);
  return (match?.[1] ?? trimmed).trim();
}

export type ParseResult =
  | { ok: true; document: Record<string, unknown> }
  | { ok: false; reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseItineraryText(text: string): ParseResult {
  const body = stripCodeFence(text);
  if (!body) {
    return { ok: false, reason: 'empty response' };
  }

  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch (error) {
    return { ok: false, reason: `JSON parsing error: ${errorMessage(error)}` };
  }

  if (!isPlainObject(value)) {
    return { ok: false, reason: 'response is not a JSON object' };
  }
  return { ok: true, document: value };
}

// ============ Validate / Repair ============

const SECTION_CHECKS: Array<[ItinerarySection, (value: unknown) => boolean]> = [
  ['overview', value => overviewSchema.safeParse(value).success],
  ['daily_itinerary', value => dailyItinerarySchema.safeParse(value).success],
  ['restaurants', value => restaurantSetSchema.safeParse(value).success],
  ['budget_summary', value => budgetSummarySchema.safeParse(value).success],
];

/** Sections that are missing or not in the expected container shape. */
export function validateItineraryDocument(document: Record<string, unknown>): ItinerarySection[] {
  return SECTION_CHECKS
    .filter(([section, isValid]) => !isValid(document[section]))
    .map(([section]) => section);
}

function defaultSection(section: ItinerarySection, city: string, days: number): unknown {
  switch (section) {
    case 'overview':
      return buildDefaultOverview(city);
    case 'daily_itinerary':
      return buildDefaultDailyItinerary(city, days);
    case 'restaurants':
      return buildDefaultRestaurants(city);
    case 'budget_summary':
      return buildDefaultBudgetSummary();
  }
}

/**
 * Replaces only the listed sections with synthetic content; every other
 * field of the generated document is kept. Returns null if the result still
 * fails the document shape.
 */
export function repairItineraryDocument(
  document: Record<string, unknown>,
  sections: ItinerarySection[],
  city: string,
  days: number
): ItineraryDocument | null {
  const repaired: Record<string, unknown> = { ...document };
  for (const section of sections) {
    repaired[section] = defaultSection(section, city, days);
  }
  const parsed = itineraryDocumentSchema.safeParse(repaired);
  return parsed.success ? parsed.data : null;
}

function fallback(request: ItineraryRequest, reason: string): GenerationState {
  return { status: 'fallback', document: buildFallbackItinerary(request.city, request.days), reason };
}

// ============ Transitions ============

export function isTerminal(state: GenerationState): state is TerminalState {
  return state.status === 'accept' || state.status === 'repair' || state.status === 'fallback';
}

export async function step(
  state: GenerationState,
  request: ItineraryRequest,
  context: MachineContext
): Promise<GenerationState> {
  switch (state.status) {
    case 'compose':
      return { status: 'request', prompt: buildItineraryPrompt(request) };

    case 'request':
      try {
        const text = await context.generator.generate(state.prompt, {
          maxOutputTokens: context.maxOutputTokens,
          signal: context.signal,
        });
        return { status: 'parse', text };
      } catch (error) {
        return fallback(request, `generation failed: ${errorMessage(error)}`);
      }

    case 'parse': {
      const parsed = parseItineraryText(state.text);
      return parsed.ok
        ? { status: 'validate', document: parsed.document }
        : fallback(request, parsed.reason);
    }

    case 'validate': {
      const invalid = validateItineraryDocument(state.document);
      if (invalid.length === 0) {
        const accepted = itineraryDocumentSchema.safeParse(state.document);
        return accepted.success
          ? { status: 'accept', document: accepted.data }
          : fallback(request, 'document failed final shape check');
      }
      const repaired = repairItineraryDocument(state.document, invalid, request.city, request.days);
      return repaired
        ? { status: 'repair', document: repaired, repaired: invalid }
        : fallback(request, 'repair did not produce a valid document');
    }

    case 'accept':
    case 'repair':
    case 'fallback':
      return state;
  }
}

export async function runItineraryMachine(
  request: ItineraryRequest,
  context: MachineContext
): Promise<ItineraryResult> {
  let state: GenerationState = { status: 'compose' };
  while (!isTerminal(state)) {
    state = await step(state, request, context);
  }

  switch (state.status) {
    case 'accept':
      console.log(`[Itinerary] Accepted generated itinerary for ${request.city}`);
      return { itinerary: state.document, outcome: 'accepted', repaired: [] };
    case 'repair':
      console.warn(`[Itinerary] Repaired sections for ${request.city}: ${state.repaired.join(', ')}`);
      return { itinerary: state.document, outcome: 'repaired', repaired: state.repaired };
    case 'fallback':
      console.warn(`[Itinerary] Using fallback itinerary for ${request.city}: ${state.reason}`);
      return { itinerary: state.document, outcome: 'fallback', repaired: [], reason: state.reason };
  }
}

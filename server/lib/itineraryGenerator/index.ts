/**
 * Itinerary Generator - Main Entry Point
 */

export { buildItineraryPrompt, type ItineraryRequest } from './prompt';

export {
  buildFallbackItinerary,
  buildDefaultRestaurants,
  buildDefaultDailyItinerary,
  buildDefaultOverview,
  buildDefaultBudgetSummary,
} from './defaults';

export {
  runItineraryMachine,
  step,
  isTerminal,
  stripCodeFence,
  parseItineraryText,
  validateItineraryDocument,
  repairItineraryDocument,
  type GenerationState,
  type TerminalState,
  type ItineraryOutcome,
  type ItineraryResult,
  type MachineContext,
  type ParseResult,
} from './machine';

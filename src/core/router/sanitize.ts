import type { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { ProductScope } from '../scope/ProductScope.js';
import { CAPABILITY_IDS, isIntent, type Intent, type RawRouteDecision, type RouteDecision } from './types.js';
import { extractSearchIntent, normalizeQuery } from './searchQuery.js';
import { hasTemporalReference } from '../time/temporal.js';

const INTENT_ALIASES: Partial<Record<string, Intent>> = {
  memory_edit: 'memory_update',
  memory_forget: 'memory_delete',
  memory_wipe: 'memory_purge',
  memory_reset: 'memory_purge',
};

const PRIMARY_TOOLS: Partial<Record<Intent, string>> = {
  memory_store: CAPABILITY_IDS.memoryStoreUserFact,
  memory_recall: CAPABILITY_IDS.memoryRecallProfile,
  memory_update: CAPABILITY_IDS.memoryUpdateUserFact,
  memory_delete: CAPABILITY_IDS.memoryDeleteUserFact,
  memory_purge: CAPABILITY_IDS.memoryPurgeAll,
};

const WEB_SEARCH_TOOLS: ReadonlySet<string> = new Set([CAPABILITY_IDS.webSearchGeneral, CAPABILITY_IDS.webSearchNews]);

export const DEFAULT_CLARIFICATION_QUESTION = '¿Podrías darme un poco más de contexto para ayudarte mejor?';
export const MIN_CONFIDENCE = 0.05;
export const MAX_CONFIDENCE = 1;

/** Maps synonyms onto the intent vocabulary; anything unrecognised is plain chat. */
export function canonicalIntent(intent: string): Intent {
  const normalized = intent.trim().toLowerCase();
  const aliased = INTENT_ALIASES[normalized] ?? normalized;
  return isIntent(aliased) ? aliased : 'general_chat';
}

export function clampConfidence(confidence: number): number {
  return Math.min(MAX_CONFIDENCE, Math.max(MIN_CONFIDENCE, confidence));
}

/**
 * Forces a decision into what the product can actually run: every tool
 * resolvable in the registry and allowed by scope, the datetime tool first
 * for time-anchored messages, and the canonical tool for the intent present.
 */
export function sanitizeDecision(
  message: string,
  decision: RawRouteDecision,
  registry: CapabilityRegistry,
  scope: ProductScope
): RouteDecision {
  const intent = canonicalIntent(decision.intent);
  const entities: Record<string, unknown> = { ...decision.entities };
  const allowed = new Set(registry.allIds());

  let tools = decision.candidate_tools.filter((toolId) => allowed.has(toolId));
  if (tools.length === 0) {
    tools = allowed.has(CAPABILITY_IDS.chatGeneral) ? [CAPABILITY_IDS.chatGeneral] : [];
  }

  const temporal = entities.temporal_reference === true || hasTemporalReference(message);
  entities.temporal_reference = temporal;
  if (temporal && allowed.has(CAPABILITY_IDS.currentDatetime) && tools[0] !== CAPABILITY_IDS.currentDatetime) {
    tools.unshift(CAPABILITY_IDS.currentDatetime);
  }

  if (intent === 'web_search') {
    const query = typeof entities.query === 'string' ? entities.query.trim() : '';
    entities.query = query || (extractSearchIntent(message) ?? normalizeQuery(message));
    if (allowed.has(CAPABILITY_IDS.webSearchGeneral) && !tools.some((toolId) => WEB_SEARCH_TOOLS.has(toolId))) {
      tools.unshift(CAPABILITY_IDS.webSearchGeneral);
    }
  } else {
    const primary = PRIMARY_TOOLS[intent];
    if (primary && allowed.has(primary) && !tools.includes(primary)) {
      tools.unshift(primary);
    }
  }

  let candidateTools = scope.filterAllowed(tools);
  if (candidateTools.length === 0) {
    const fallbackAvailable =
      scope.isAllowed(CAPABILITY_IDS.chatGeneral) && registry.get(CAPABILITY_IDS.chatGeneral) !== undefined;
    candidateTools = fallbackAvailable ? [CAPABILITY_IDS.chatGeneral] : [];
  }

  const clarificationQuestion =
    decision.needs_clarification && !decision.clarification_question.trim()
      ? DEFAULT_CLARIFICATION_QUESTION
      : decision.clarification_question;

  return {
    intent,
    entities,
    candidate_tools: candidateTools,
    confidence: clampConfidence(decision.confidence),
    needs_clarification: decision.needs_clarification,
    clarification_question: clarificationQuestion,
  };
}

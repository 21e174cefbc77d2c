import type { DecisionSource, RawRouteDecision, RouteDecision } from './types.js';

/** The classifier never wins below this confidence. */
export const MIN_SEMANTIC_CONFIDENCE = 0.35;
/** How far below the heuristic the classifier may score and still win. */
export const SEMANTIC_MARGIN = 0.1;

export interface FusedDecision {
  decision: RawRouteDecision;
  source: DecisionSource;
}

// Confidences are compared in whole hundredths so 0.8 - 0.1 still equals 0.7
function hundredths(value: number): number {
  return Math.round(value * 100);
}

export function fuseDecisions(heuristic: RouteDecision, semantic: RawRouteDecision | null): FusedDecision {
  if (!semantic) {
    return { decision: heuristic, source: 'heuristic' };
  }
  const threshold = Math.max(
    hundredths(MIN_SEMANTIC_CONFIDENCE),
    hundredths(heuristic.confidence) - hundredths(SEMANTIC_MARGIN)
  );
  if (hundredths(semantic.confidence) >= threshold) {
    return { decision: semantic, source: 'semantic' };
  }
  return { decision: heuristic, source: 'heuristic' };
}

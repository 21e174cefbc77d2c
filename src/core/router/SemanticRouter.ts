import type pino from 'pino';
import type { LLMPort } from '../../ports/LLMPort.js';
import type { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { ProductScope } from '../scope/ProductScope.js';
import { JsonGuard } from '../json/JsonGuard.js';
import { heuristicRoute } from './heuristics.js';
import { fuseDecisions } from './fusion.js';
import { sanitizeDecision } from './sanitize.js';
import { INTENTS, routeDecisionSchema, type HistoryTurn, type RawRouteDecision, type RouteDecision } from './types.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { renderPrompt } from '../../utils/prompts.js';
import { truncate } from '../../utils/text.js';

const CLASSIFIER_SYSTEM_PROMPT =
  'You are a semantic intent classifier for a personal assistant. ' +
  'Users mostly write in Spanish. Return only JSON, with high precision.';

const HISTORY_CONTENT_LIMIT = 160;

export interface SemanticRouterOptions {
  llmPort: LLMPort;
  registry: CapabilityRegistry;
  scope: ProductScope;
  /** Template with {{MESSAGE}}, {{HISTORY}}, {{INTENTS}} and {{TOOLS}} placeholders. */
  promptTemplate: string;
  maxRetries?: number;
  historyTurns?: number;
}

export function formatHistory(history: readonly HistoryTurn[], turns: number): string {
  const tail = turns > 0 ? history.slice(-turns) : [];
  if (tail.length === 0) {
    return '- (no history)';
  }
  return tail
    .map((turn) => `- ${turn.role || 'unknown'}: ${truncate(turn.content, HISTORY_CONTENT_LIMIT)}`)
    .join('\n');
}

/**
 * Turns a user message into a sanitized RouteDecision. The keyword heuristic
 * always runs; the model classifier may replace it when confident enough.
 * The router only decides; it never invokes the tools it selects.
 */
export class SemanticRouter {
  private readonly logger = createLogger({ component: 'SemanticRouter' });
  private readonly registry: CapabilityRegistry;
  private readonly scope: ProductScope;
  private readonly jsonGuard: JsonGuard;
  private readonly promptTemplate: string;
  private readonly historyTurns: number;

  constructor(options: SemanticRouterOptions) {
    this.registry = options.registry;
    this.scope = options.scope;
    this.promptTemplate = options.promptTemplate;
    this.historyTurns = options.historyTurns ?? 4;
    this.jsonGuard = new JsonGuard(options.llmPort, {
      maxRetries: options.maxRetries ?? 2,
      maxTokens: 400,
      temperature: 0.1,
    });
  }

  async route(message: string, history: readonly HistoryTurn[] = []): Promise<RouteDecision> {
    const logger = this.logger.child({ routeId: generateCorrelationId() });

    const heuristic = heuristicRoute(message);
    const semantic = await this.semanticRoute(message, history, logger);
    const { decision, source } = fuseDecisions(heuristic, semantic);
    const sanitized = sanitizeDecision(message, decision, this.registry, this.scope);

    logger.info(
      {
        intent: sanitized.intent,
        confidence: Number(sanitized.confidence.toFixed(2)),
        tools: sanitized.candidate_tools,
        source,
      },
      'Router decision'
    );
    return sanitized;
  }

  private async semanticRoute(
    message: string,
    history: readonly HistoryTurn[],
    logger: pino.Logger
  ): Promise<RawRouteDecision | null> {
    const allowedTools = this.registry.allIds();
    if (allowedTools.length === 0) {
      logger.debug('No capabilities in scope, skipping classifier');
      return null;
    }

    const userPrompt = renderPrompt(this.promptTemplate, {
      MESSAGE: message,
      HISTORY: formatHistory(history, this.historyTurns),
      INTENTS: INTENTS.join(', '),
      TOOLS: allowedTools.join(', '),
    });

    const { value, trace } = await this.jsonGuard.generate(routeDecisionSchema, CLASSIFIER_SYSTEM_PROMPT, userPrompt);
    if (!value) {
      logger.warn(
        { attempts: trace.outputs.length, error: trace.lastError },
        'Classifier output never validated, keeping heuristic route'
      );
      return null;
    }
    return value;
  }
}

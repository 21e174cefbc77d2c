import type { Config } from './config/index.js';
import type { LLMPort } from './ports/LLMPort.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { DisabledLLMAdapter } from './adapters/llm/DisabledLLMAdapter.js';
import { ProductScope } from './core/scope/ProductScope.js';
import { CapabilityRegistry } from './core/registry/CapabilityRegistry.js';
import { SemanticRouter } from './core/router/SemanticRouter.js';
import { loadPrompt } from './utils/prompts.js';
import { createLogger, setLogLevel } from './utils/logger.js';

export interface RoutingLayer {
  scope: ProductScope;
  registry: CapabilityRegistry;
  router: SemanticRouter;
}

export function createLLMPort(config: Pick<Config, 'anthropicApiKey' | 'llmTextModel'>): LLMPort {
  return config.anthropicApiKey ? new ClaudeAdapter(config) : new DisabledLLMAdapter();
}

/** Loads scope and registry, audits them against each other and wires the router. */
export async function createRoutingLayer(config: Config, llmPort?: LLMPort): Promise<RoutingLayer> {
  setLogLevel(config.logLevel);
  const logger = createLogger({ component: 'bootstrap' });
  const scope = new ProductScope(config.productScopePath);
  const registry = new CapabilityRegistry(config.capabilitiesPath, scope);

  const { missingInRegistry, missingInScope } = registry.ensureScopeConsistency();
  if (missingInRegistry.size > 0) {
    logger.warn({ capabilities: [...missingInRegistry] }, 'Scope allows capabilities the registry does not define');
  }
  if (missingInScope.size > 0) {
    logger.info({ capabilities: [...missingInScope] }, 'Registry capabilities outside product scope');
  }

  const router = new SemanticRouter({
    llmPort: llmPort ?? createLLMPort(config),
    registry,
    scope,
    promptTemplate: await loadPrompt('route_classifier.md'),
    maxRetries: config.routerMaxRetries,
    historyTurns: config.routerHistoryTurns,
  });

  logger.info(
    { registryVersion: registry.version, capabilities: registry.allIds().length },
    'Routing layer initialized'
  );
  return { scope, registry, router };
}

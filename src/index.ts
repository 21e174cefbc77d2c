export { loadConfig, type Config } from './config/index.js';
export { createRoutingLayer, createLLMPort, type RoutingLayer } from './bootstrap.js';
export type { ChatMessage, LLMPort, LLMRequest, LLMResponse } from './ports/LLMPort.js';
export { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
export { DisabledLLMAdapter } from './adapters/llm/DisabledLLMAdapter.js';
export { ProductScope } from './core/scope/ProductScope.js';
export { CapabilityRegistry } from './core/registry/CapabilityRegistry.js';
export type { CapabilityDefinition, RegistrySnapshot, ScopeConsistencyReport } from './core/registry/types.js';
export { JsonGuard, type JsonGuardResult, type JsonGuardTrace } from './core/json/JsonGuard.js';
export { extractFirstJsonObject, localJsonRepair, validateJsonOutput } from './core/json/jsonRepair.js';
export { SemanticRouter, type SemanticRouterOptions } from './core/router/SemanticRouter.js';
export {
  INTENTS,
  routeDecisionSchema,
  type HistoryTurn,
  type Intent,
  type RawRouteDecision,
  type RouteDecision,
} from './core/router/types.js';
export { RouterError, ConfigError, LLMError, CatalogError } from './utils/errors.js';

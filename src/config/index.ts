import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { LOG_LEVELS } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const catalogDir = join(__dirname, '../../catalog');

export const DEFAULT_CAPABILITIES_PATH = join(catalogDir, 'CAPABILITIES.yaml');
export const DEFAULT_PRODUCT_SCOPE_PATH = join(catalogDir, 'PRODUCT_SCOPE.md');

const configSchema = z.object({
  // Anthropic
  anthropicApiKey: z.string().min(1).optional(),
  llmTextModel: z.string().optional(),

  // Catalog documents
  capabilitiesPath: z.string().default(DEFAULT_CAPABILITIES_PATH),
  productScopePath: z.string().default(DEFAULT_PRODUCT_SCOPE_PATH),

  // Router
  routerMaxRetries: z.coerce.number().int().min(0).max(5).default(2),
  routerHistoryTurns: z.coerce.number().int().positive().default(4),

  // App
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmTextModel: env('LLM_TEXT_MODEL'),
    capabilitiesPath: env('CAPABILITIES_PATH'),
    productScopePath: env('PRODUCT_SCOPE_PATH'),
    routerMaxRetries: env('ROUTER_MAX_RETRIES'),
    routerHistoryTurns: env('ROUTER_HISTORY_TURNS'),
    logLevel: env('LOG_LEVEL'),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

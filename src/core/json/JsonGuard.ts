import type { z } from 'zod';
import type { ChatMessage, LLMPort } from '../../ports/LLMPort.js';
import { localJsonRepair, validateJsonOutput } from './jsonRepair.js';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

const DEFAULT_MAX_RETRIES = 2;

const JSON_ONLY_INSTRUCTION =
  'You must reply with a single valid JSON object only. Do not use markdown and do not add any other text.';

export interface JsonGuardTrace {
  /** Every raw model reply, in order. */
  outputs: string[];
  lastError: string;
}

export interface JsonGuardResult<T> {
  /** null when no reply validated within the attempt budget. */
  value: T | null;
  trace: JsonGuardTrace;
}

export interface JsonGuardOptions {
  maxRetries?: number;
  maxTokens?: number;
  temperature?: number;
}

function buildRepairRequest(lastError: string): string {
  return (
    'Your previous output does not match the required JSON schema. ' +
    `Validation error: ${lastError}\n` +
    'Return only valid JSON, without markdown and without extra text.'
  );
}

/**
 * Generation -> validation -> repair loop around an unreliable text model.
 * Each reply is tried as-is and after local repair; only when both fail is
 * the model asked again, with the exact validation error quoted back.
 */
export class JsonGuard {
  private readonly logger = createLogger({ component: 'JsonGuard' });
  private readonly maxRetries: number;

  constructor(
    private readonly llmPort: LLMPort,
    private readonly options: JsonGuardOptions = {}
  ) {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.maxRetries = Number.isFinite(maxRetries) ? Math.max(0, Math.floor(maxRetries)) : DEFAULT_MAX_RETRIES;
  }

  async generate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    systemPrompt: string,
    userPrompt: string
  ): Promise<JsonGuardResult<T>> {
    const trace: JsonGuardTrace = { outputs: [], lastError: '' };
    const guardedSystemPrompt = `${systemPrompt.trim()}\n\n${JSON_ONLY_INSTRUCTION}`;
    const attempts = this.maxRetries + 1;
    let messages: ChatMessage[] = [{ role: 'user', content: userPrompt }];

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      let raw: string;
      try {
        const response = await this.llmPort.generateResponse({
          messages,
          systemPrompt: guardedSystemPrompt,
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
        });
        raw = response.text;
      } catch (error) {
        trace.lastError = `Model call failed: ${errorMessage(error)}`;
        this.logger.warn({ attempt, error: trace.lastError }, 'Guarded JSON generation aborted');
        return { value: null, trace };
      }
      trace.outputs.push(raw);

      for (const candidate of [raw, localJsonRepair(raw)]) {
        const result = validateJsonOutput(candidate, schema);
        if (result.success) {
          this.logger.debug({ attempt }, 'Model output validated');
          return { value: result.data, trace };
        }
        trace.lastError = result.error;
      }

      this.logger.debug({ attempt, error: trace.lastError }, 'Model output failed validation');
      messages = [
        { role: 'user', content: userPrompt },
        // Assistant turns may not be empty
        { role: 'assistant', content: raw.trim() ? raw : '(empty reply)' },
        { role: 'user', content: buildRepairRequest(trace.lastError) },
      ];
    }

    return { value: null, trace };
  }
}

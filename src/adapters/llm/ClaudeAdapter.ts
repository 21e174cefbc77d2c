import Anthropic from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

const DEFAULT_TEXT_MODEL = 'claude-sonnet-4-5';

/** The classifier system prompt is identical on every call, so it is marked cacheable. */
function buildSystemParam(systemPrompt: string): Anthropic.TextBlockParam[] | undefined {
  if (!systemPrompt.trim()) {
    return undefined;
  }
  return [
    {
      type: 'text',
      text: systemPrompt,
      cache_control: { type: 'ephemeral' },
    },
  ];
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly textModel: string;

  constructor(config: Pick<Config, 'anthropicApiKey' | 'llmTextModel'>) {
    this.client = new Anthropic({ apiKey: config.anthropicApiKey });
    this.textModel = config.llmTextModel ?? DEFAULT_TEXT_MODEL;
    this.logger.info({ textModel: this.textModel }, 'Claude adapter initialized');
  }

  async generateResponse(request: LLMRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateResponse' });
    try {
      const response = await this.client.messages.create({
        model: this.textModel,
        max_tokens: request.maxTokens ?? 800,
        temperature: request.temperature ?? 0.2,
        system: buildSystemParam(request.systemPrompt),
        messages: request.messages.map((message) => ({
          role: message.role,
          content: message.content,
        })),
      });

      return buildLlmResponse(response);
    } catch (error) {
      logger.error({ error }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', { cause: error });
    }
  }
}

function buildLlmResponse(response: Anthropic.Message): LLMResponse {
  const text = response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
  return {
    text,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}

import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';

/** Stand-in when no model is configured; every guarded call then exhausts and routing stays heuristic. */
export class DisabledLLMAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'DisabledLLMAdapter' });

  async generateResponse(_request: LLMRequest): Promise<LLMResponse> {
    this.logger.debug('LLM adapter is disabled; returning empty response');
    return { text: '' };
  }
}

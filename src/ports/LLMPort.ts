export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: ChatMessage[];
  systemPrompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Opaque text-generation client. Implementations own their own timeout and
 * network retry policy; callers only see text or a rejected promise.
 */
export interface LLMPort {
  generateResponse(request: LLMRequest): Promise<LLMResponse>;
}

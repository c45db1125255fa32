import { z } from 'zod';
import { LLMSettings } from '../config';
import { createLogger } from '../utils/logger';

const logger = createLogger('LLMService');

export interface LLMRequest {
  system: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON object response. */
  json?: boolean;
}

export interface LLMClient {
  complete(request: LLMRequest): Promise<string>;
}

interface LLMQueryLog {
  prompt: string;
  response: string;
  timestamp: number;
  duration: number;
}

interface CircuitBreakerState {
  failures: number;
  lastFailureTime: number;
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  requestCount: number;
  successCount: number;
}

export class LLMServiceError extends Error {
  constructor(message: string, public statusCode?: number) {
    super(message);
    this.name = "LLMServiceError";
  }
}

export const LLM_QUERY_LOGS: LLMQueryLog[] = [];

const MAX_QUERY_LOGS = 50;

const recordQueryLog = (entry: LLMQueryLog): void => {
  LLM_QUERY_LOGS.push(entry);
  if (LLM_QUERY_LOGS.length > MAX_QUERY_LOGS) {
    LLM_QUERY_LOGS.splice(0, LLM_QUERY_LOGS.length - MAX_QUERY_LOGS);
  }
};

export class CircuitBreaker {
  private state: CircuitBreakerState = {
    failures: 0,
    lastFailureTime: 0,
    state: 'CLOSED',
    requestCount: 0,
    successCount: 0
  };

  constructor(
    private failureThreshold = 5,
    private recoveryTimeout = 30000,
  ) {}

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state.state === 'OPEN') {
      if (Date.now() - this.state.lastFailureTime > this.recoveryTimeout) {
        this.state.state = 'HALF_OPEN';
        this.state.requestCount = 0;
        this.state.successCount = 0;
      } else {
        throw new LLMServiceError('Circuit breaker is OPEN - service unavailable');
      }
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    this.state.failures = 0;
    this.state.successCount++;

    if (this.state.state === 'HALF_OPEN' && this.state.successCount >= 3) {
      this.state.state = 'CLOSED';
    }
  }

  private onFailure(): void {
    this.state.failures++;
    this.state.lastFailureTime = Date.now();
    this.state.requestCount++;

    if (this.state.failures >= this.failureThreshold) {
      this.state.state = 'OPEN';
    }
  }

  getState(): CircuitBreakerState {
    return { ...this.state };
  }
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }),
  })).min(1),
});

/** Client for any OpenAI-compatible `/chat/completions` endpoint. */
export class ChatCompletionClient implements LLMClient {
  private baseUrl: string;
  private apiKey?: string;
  private model: string;
  private timeoutMs: number;
  private breaker: CircuitBreaker;

  constructor(settings: { llm: LLMSettings }, breaker: CircuitBreaker = new CircuitBreaker()) {
    const url = settings.llm.base_url;
    this.baseUrl = url.endsWith('/') ? url.slice(0, -1) : url;
    this.apiKey = settings.llm.api_key;
    this.model = settings.llm.model;
    this.timeoutMs = settings.llm.timeout_ms;
    this.breaker = breaker;

    logger.info(`LLM client initialized for model ${this.model}${this.apiKey ? '' : ' without API key'}`);
  }

  async complete(request: LLMRequest): Promise<string> {
    if (!request.prompt || request.prompt.trim().length === 0) {
      throw new LLMServiceError('Prompt must be a non-empty string');
    }
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new LLMServiceError('LLM API key not configured');
    }

    const startTime = Date.now();

    try {
      const content = await this.breaker.execute(async () => {
        const response = await fetch(`${this.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({
            model: this.model,
            messages: [
              { role: 'system', content: request.system },
              { role: 'user', content: request.prompt },
            ],
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            response_format: request.json ? { type: 'json_object' } : undefined,
          }),
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
          const errorText = await response.text();
          throw new LLMServiceError(
            `LLM API request failed (HTTP ${response.status}): ${errorText.substring(0, 100)}`,
            response.status
          );
        }

        const data = ChatCompletionResponseSchema.parse(await response.json());
        return (data.choices[0].message.content ?? '').trim();
      });

      recordQueryLog({
        prompt: request.prompt.substring(0, 500),
        response: content.substring(0, 1000),
        timestamp: Date.now(),
        duration: Date.now() - startTime,
      });

      return content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      recordQueryLog({
        prompt: `[ERROR] ${request.prompt.substring(0, 100)}...`,
        response: `Error: ${message}`,
        timestamp: Date.now(),
        duration: Date.now() - startTime,
      });

      if (error instanceof LLMServiceError) {
        throw error;
      }
      throw new LLMServiceError(`LLM service error: ${message}`);
    }
  }

  getServiceStatus(): { state: string; failures: number; requestCount: number } {
    const state = this.breaker.getState();
    return {
      state: state.state,
      failures: state.failures,
      requestCount: state.requestCount
    };
  }
}

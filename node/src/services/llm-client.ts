// node/src/services/llm-client.ts — JSON-mode chat completions behind retry, timeout and circuit breaker
import OpenAI from 'openai';
import { logger } from '@/services/logger';
import { safeParseJson, type JsonObject } from '@/services/safe-parse-json';
import { CircuitBreaker, CircuitOpenError, createLlmCircuitBreaker } from '@/stability/circuitBreaker';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { GenerativeError, TimeoutError, errorMessage } from '@/utils/errors';

export interface JsonCompletionRequest {
  model: string;
  system: string;
  user: string;
  temperature?: number;
  maxTokens?: number;
  /** Short label for logs, e.g. "select". */
  context: string;
}

/** Returns a parsed JSON object or throws a GenerativeError. */
export interface LlmJsonClient {
  completeJson(request: JsonCompletionRequest): Promise<JsonObject>;
}

export interface OpenAiJsonClientOptions {
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  breaker?: CircuitBreaker;
}

export function isTransientLlmError(err: unknown): boolean {
  if (err instanceof CircuitOpenError) return false;
  if (err instanceof TimeoutError) return true;
  if (err instanceof OpenAI.APIError) {
    return err.status === undefined || err.status === 429 || err.status >= 500;
  }
  return false;
}

function toGenerativeError(err: unknown): GenerativeError {
  if (err instanceof GenerativeError) return err;
  if (err instanceof CircuitOpenError) return new GenerativeError('circuit_open', err.message, { cause: err });
  if (err instanceof TimeoutError) return new GenerativeError('timeout', err.message, { cause: err });
  return new GenerativeError('http', errorMessage(err), { cause: err });
}

export class OpenAiJsonClient implements LlmJsonClient {
  private client: OpenAI | null = null;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly options: OpenAiJsonClientOptions) {
    this.breaker = options.breaker ?? createLlmCircuitBreaker(options.timeoutMs);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new GenerativeError(
          'not_configured',
          'Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.',
        );
      }
      // Retries and timeouts are handled here, not by the SDK.
      this.client = new OpenAI({ apiKey: this.options.apiKey, maxRetries: 0, timeout: this.options.timeoutMs });
    }
    return this.client;
  }

  async completeJson(request: JsonCompletionRequest): Promise<JsonObject> {
    const started = Date.now();
    let content: string;
    try {
      const client = this.getClient();
      content = await retryWithBackoff(
        () => this.breaker.execute(() => this.create(client, request)),
        {
          maxRetries: this.options.maxRetries,
          initialDelay: 250,
          isRetryable: isTransientLlmError,
          label: `llm:${request.context}`,
        },
      );
    } catch (err) {
      const failure = toGenerativeError(err);
      logger.warn('llm:call_failed', { context: request.context, kind: failure.kind, error: failure.message });
      throw failure;
    }

    logger.debug('llm:call_done', { context: request.context, ms: Date.now() - started });

    if (!content.trim()) {
      throw new GenerativeError('empty_content', `Empty completion for ${request.context}`);
    }
    const parsed = safeParseJson(content, request.context);
    if (!parsed) {
      throw new GenerativeError('invalid_json', `Completion for ${request.context} is not a JSON object`);
    }
    return parsed;
  }

  private async create(client: OpenAI, request: JsonCompletionRequest): Promise<string> {
    const res = await client.chat.completions.create({
      model: request.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
      temperature: request.temperature ?? 0,
      response_format: { type: 'json_object' },
      ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
    });
    return res.choices[0]?.message?.content ?? '';
  }
}

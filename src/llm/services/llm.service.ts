// src/llm/services/llm.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { LlmMessage, LlmProvider, TextGenerator } from '../interfaces/llm.interface';
import { createLlmHttpsAgent, createOpenAIHttp, resolveProxyUrl } from '../utils/openai-http.factory';
import { RetryOptions, retryWithBackoff } from '../utils/retry-with-backoff';
import { CircuitBreaker } from '../utils/circuit-breaker';
import { readNumber } from '../../common/utils/config-value.util';
import { extractErrorCode, extractErrorMessage, extractErrorStack } from '../../common/utils/error-message.util';

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_OPENAI_MODEL = 'gpt-3.5-turbo-0125';
export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';
const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

/** Completion limits for itinerary generation */
const MAX_OUTPUT_TOKENS = 1000;
const TEMPERATURE = 0;

const DEFAULT_MAX_RETRIES = 3;

const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT'];

interface OpenAIChatCompletion {
  choices?: Array<{ message?: { content?: string | null } }>;
}

interface GeminiGenerateContentResponse {
  candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: Array<{ text: string }>;
}

/**
 * LLM service
 *
 * Sends a chat to OpenAI chat completions or Gemini `generateContent`,
 * whichever key is configured, and returns the reply text.
 *
 * Falls back to a deterministic mock reply when:
 * - mock mode is on (`LLM_USE_MOCK=true` or no API key at all)
 * - the circuit breaker is open
 * - the upstream cannot be reached
 */
@Injectable()
export class LlmService implements TextGenerator {
  private readonly logger = new Logger(LlmService.name);
  private readonly defaultProvider: LlmProvider;
  private readonly useMock: boolean;

  private readonly openaiHttp: AxiosInstance;
  private readonly geminiHttp: AxiosInstance;
  // trips after 5 consecutive failures, probes again after a minute
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retryOptions: RetryOptions;

  constructor(private readonly configService: ConfigService) {
    const baseUrl = this.configService.get<string>('OPENAI_BASE_URL') || DEFAULT_OPENAI_BASE_URL;
    this.openaiHttp = createOpenAIHttp(baseUrl, this.logger);
    this.geminiHttp = axios.create({
      baseURL: GEMINI_BASE_URL,
      timeout: 60000,
      proxy: false,
      httpsAgent: createLlmHttpsAgent(resolveProxyUrl()),
      headers: { 'Content-Type': 'application/json' },
    });

    this.circuitBreaker = new CircuitBreaker('LlmService', {
      failureThreshold: 5,
      resetTimeoutMs: 60000,
      halfOpenMaxCalls: 2,
    });

    this.retryOptions = {
      maxRetries: this.readMaxRetries(),
      initialDelayMs: 200,
      maxDelayMs: 2000,
      factor: 2,
      jitter: true,
    };

    const hasOpenAI = Boolean(this.configService.get<string>('OPENAI_API_KEY'));
    const hasGemini = Boolean(this.configService.get<string>('GEMINI_API_KEY'));
    this.defaultProvider = !hasOpenAI && hasGemini ? LlmProvider.GEMINI : LlmProvider.OPENAI;

    const mockRequested = this.configService.get<string>('LLM_USE_MOCK') === 'true';
    if (!mockRequested && !hasOpenAI && !hasGemini) {
      this.logger.warn('No LLM API key configured and LLM_USE_MOCK not set, using mock mode');
    }
    this.useMock = mockRequested || (!hasOpenAI && !hasGemini);
  }

  isMockMode(): boolean {
    return this.useMock;
  }

  getDefaultProvider(): LlmProvider {
    return this.defaultProvider;
  }

  /**
   * Send a chat and return the reply text
   */
  async generate(messages: LlmMessage[], provider: LlmProvider = this.defaultProvider): Promise<string> {
    if (this.useMock) {
      this.logger.warn('Using mock LLM response');
      return this.getMockResponse(messages);
    }

    if (this.circuitBreaker.isOpen()) {
      this.logger.warn(`Circuit breaker is ${this.circuitBreaker.getState()}, falling back to mock mode`);
      return this.getMockResponse(messages);
    }

    try {
      const reply =
        provider === LlmProvider.GEMINI ? await this.callGemini(messages) : await this.callOpenAI(messages);
      this.circuitBreaker.recordSuccess();
      return reply;
    } catch (error) {
      this.circuitBreaker.recordFailure();

      if (this.isNetworkError(error)) {
        this.logger.warn(`LLM API call failed (${extractErrorMessage(error)}), falling back to mock mode`);
        return this.getMockResponse(messages);
      }
      throw error;
    }
  }

  /**
   * LLM_MAX_RETRIES as a non-negative integer; blank or unset gives the default
   */
  private readMaxRetries(): number {
    const raw = this.configService.get<string>('LLM_MAX_RETRIES');
    const value = readNumber(this.configService, 'LLM_MAX_RETRIES');
    if (raw === undefined || String(raw).trim() === '') {
      return DEFAULT_MAX_RETRIES;
    }
    if (value === undefined || !Number.isInteger(value) || value < 0) {
      this.logger.warn(`LLM_MAX_RETRIES must be a non-negative integer, got "${raw}"; using ${DEFAULT_MAX_RETRIES}`);
      return DEFAULT_MAX_RETRIES;
    }
    return value;
  }

  private async callOpenAI(messages: LlmMessage[]): Promise<string> {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }

    const model = this.configService.get<string>('OPENAI_MODEL') || DEFAULT_OPENAI_MODEL;
    const body = {
      model,
      messages,
      max_tokens: MAX_OUTPUT_TOKENS,
      temperature: TEMPERATURE,
    };

    this.logger.debug(`Calling OpenAI ${model} with ${messages.length} message(s)`);

    try {
      const response = await retryWithBackoff(
        () =>
          this.openaiHttp.post<OpenAIChatCompletion>('/chat/completions', body, {
            headers: { Authorization: `Bearer ${apiKey}` },
          }),
        this.retryOptions
      );
      return response.data.choices?.[0]?.message?.content ?? '';
    } catch (error) {
      throw this.toUpstreamError('OpenAI', error);
    }
  }

  private async callGemini(messages: LlmMessage[]): Promise<string> {
    const apiKey = this.configService.get<string>('GEMINI_API_KEY');
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY not configured');
    }

    const model = this.configService.get<string>('GEMINI_MODEL') || DEFAULT_GEMINI_MODEL;
    const systemText = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n');
    const contents: GeminiContent[] = messages
      .filter((message) => message.role !== 'system')
      .map((message): GeminiContent => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    const body = {
      contents,
      ...(systemText ? { systemInstruction: { parts: [{ text: systemText }] } } : {}),
      generationConfig: { maxOutputTokens: MAX_OUTPUT_TOKENS, temperature: TEMPERATURE },
    };

    this.logger.debug(`Calling Gemini ${model} with ${contents.length} message(s)`);

    try {
      const response = await retryWithBackoff(
        () =>
          this.geminiHttp.post<GeminiGenerateContentResponse>(`/models/${model}:generateContent`, body, {
            params: { key: apiKey },
          }),
        this.retryOptions
      );
      return response.data.candidates?.[0]?.content?.parts?.[0]?.text ?? '';
    } catch (error) {
      throw this.toUpstreamError('Gemini', error);
    }
  }

  private toUpstreamError(providerName: string, error: unknown): Error {
    this.logger.error(`${providerName} API error: ${extractErrorMessage(error)}`, extractErrorStack(error));

    if (isAxiosError(error)) {
      if (error.response) {
        return new Error(
          `${providerName} API error: ${error.response.status} ${JSON.stringify(error.response.data)}`
        );
      }
      if (error.request) {
        return new Error(`${providerName} API request failed: no response received. Check network connection.`);
      }
    }
    return new Error(`${providerName} API request failed: ${extractErrorMessage(error)}`);
  }

  private isNetworkError(error: unknown): boolean {
    const message = extractErrorMessage(error);
    return (
      message.includes('no response received') ||
      message.includes('network') ||
      NETWORK_ERROR_CODES.includes(extractErrorCode(error))
    );
  }

  /**
   * Deterministic stand-in reply
   *
   * An itinerary prompt gets a skeleton itinerary for its destination; any
   * other chat gets its last user message echoed back.
   */
  private getMockResponse(messages: LlmMessage[]): string {
    const lastUserMessage = [...messages].reverse().find((message) => message.role === 'user');
    const content = lastUserMessage?.content ?? '';
    const destination = content.match(/^for a trip to (.+),$/m)?.[1];

    if (destination) {
      return [
        `Mock itinerary for ${destination}`,
        'Day 1: Arrive, check in and explore the neighbourhood.',
        'Day 2: Visit the suggested attractions.',
        'Day 3: Free day for local food and markets.',
      ].join('\n');
    }
    return `Mock reply: ${content}`;
  }
}

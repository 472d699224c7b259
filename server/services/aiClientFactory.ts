/**
 * AI Client Factory — provider selection for the itinerary model.
 *
 * Key cascade:
 *   OPENAI_API_KEY    → OpenAI endpoint (or LLM_BASE_URL)
 *   DEEPSEEK_API_KEY  → DeepSeek's OpenAI-compatible endpoint
 *
 * Model: LLM_MODEL, else gpt-4o-mini (OpenAI) / deepseek-chat (DeepSeek).
 */

import OpenAI from 'openai';
import type { AppConfig } from '../config';
import type { ItineraryLLM, LLMChunk } from './itinerary';

// ============================================================================
// TYPES
// ============================================================================

export type AIConfig = Pick<
  AppConfig,
  | 'OPENAI_API_KEY'
  | 'DEEPSEEK_API_KEY'
  | 'LLM_BASE_URL'
  | 'LLM_MODEL'
  | 'LLM_TEMPERATURE'
  | 'LLM_MAX_TOKENS'
  | 'LLM_STREAMING'
  | 'LLM_TIMEOUT_MS'
>;

export interface AIClient {
  openai: OpenAI;
  model: string;
}

interface ProviderConfig {
  apiKey: string;
  baseURL?: string;
  isDeepSeek: boolean;
}

// ============================================================================
// DEFAULTS
// ============================================================================

const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
const DEEPSEEK_DEFAULT_MODEL = 'deepseek-chat';
const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

const SYSTEM_PROMPT = '你是一位专业的旅行规划师，只输出合法的 JSON。';

// ============================================================================
// SINGLETON CACHE (one OpenAI instance per key + baseURL)
// ============================================================================

const clientCache = new Map<string, OpenAI>();

function getOrCreateOpenAI(apiKey: string, baseURL: string | undefined, timeout: number): OpenAI {
  const cacheKey = `${apiKey.slice(0, 8)}:${baseURL ?? 'default'}:${timeout}`;
  let client = clientCache.get(cacheKey);
  if (!client) {
    client = new OpenAI({ apiKey, baseURL, timeout });
    clientCache.set(cacheKey, client);
  }
  return client;
}

// ============================================================================
// PROVIDER DETECTION
// ============================================================================

export function detectProvider(config: AIConfig): ProviderConfig | null {
  // Priority 1: OpenAI key → OpenAI API unless a base URL is configured
  if (config.OPENAI_API_KEY) {
    return {
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.LLM_BASE_URL,
      isDeepSeek: false,
    };
  }

  // Priority 2: DeepSeek key → DeepSeek API
  if (config.DEEPSEEK_API_KEY) {
    return {
      apiKey: config.DEEPSEEK_API_KEY,
      baseURL: config.LLM_BASE_URL ?? DEEPSEEK_BASE_URL,
      isDeepSeek: true,
    };
  }

  return null;
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function getAIClient(config: AIConfig): AIClient {
  const provider = detectProvider(config);
  if (!provider) {
    throw new Error(
      '[AIClientFactory] No AI API key configured. Set OPENAI_API_KEY or DEEPSEEK_API_KEY.'
    );
  }

  const model = config.LLM_MODEL || (provider.isDeepSeek ? DEEPSEEK_DEFAULT_MODEL : OPENAI_DEFAULT_MODEL);
  const openai = getOrCreateOpenAI(provider.apiKey, provider.baseURL, config.LLM_TIMEOUT_MS);

  return { openai, model };
}

export function isAIConfigured(config: AIConfig): boolean {
  return detectProvider(config) !== null;
}

/**
 * Wrap a chat-completions client as the itinerary model.
 * `stream` is only exposed when LLM_STREAMING is on.
 */
export function createItineraryLLM(config: AIConfig, client: AIClient = getAIClient(config)): ItineraryLLM {
  const { openai, model } = client;
  const messages = (prompt: string): OpenAI.Chat.ChatCompletionMessageParam[] => [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: prompt },
  ];

  const llm: ItineraryLLM = {
    async invoke(prompt: string): Promise<string> {
      const response = await openai.chat.completions.create({
        model,
        messages: messages(prompt),
        temperature: config.LLM_TEMPERATURE,
        max_tokens: config.LLM_MAX_TOKENS,
      });
      return response.choices[0]?.message?.content ?? '';
    },
  };

  if (config.LLM_STREAMING) {
    llm.stream = async function* (prompt: string): AsyncGenerator<LLMChunk> {
      const stream = await openai.chat.completions.create({
        model,
        messages: messages(prompt),
        temperature: config.LLM_TEMPERATURE,
        max_tokens: config.LLM_MAX_TOKENS,
        stream: true,
      });
      for await (const chunk of stream) {
        yield { content: chunk.choices[0]?.delta?.content ?? null };
      }
    };
  }

  return llm;
}

/**
 * Log that AI is configured (no provider/model names exposed).
 */
export function logAIConfig(config: AIConfig): void {
  if (!isAIConfigured(config)) {
    console.log('[AIClientFactory] No AI provider configured');
    return;
  }
  console.log('[AIClientFactory] AI provider configured and ready');
}

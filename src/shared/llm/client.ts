/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Supports structured output and response caching. Retries are left to the
 * provider SDKs' own defaults.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import {
  LLMCompleter,
  LLMConfig,
  LLMMessage,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG
} from './types';
import { LLMCache, CacheConfig, CacheStats, DEFAULT_CACHE_CONFIG } from './cache';
import { createComponentLogger } from '../logging/logger';

const log = createComponentLogger('llm');

type ConversationMessage = LLMMessage & { role: 'user' | 'assistant' };

function isConversationMessage(message: LLMMessage): message is ConversationMessage {
  return message.role === 'user' || message.role === 'assistant';
}

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient implements LLMCompleter {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private cache: LLMCache;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string },
    cacheConfig: Partial<CacheConfig> = {}
  ) {
    const provider: LLMProvider = config.provider ?? 'anthropic';

    // Merge with defaults
    const defaults = DEFAULT_LLM_CONFIG[provider];
    this.config = {
      ...defaults,
      ...config,
      provider
    };

    if (this.config.provider === 'anthropic') {
      this.anthropicClient = new Anthropic({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout
      });
    }

    this.cache = new LLMCache({ ...DEFAULT_CACHE_CONFIG, ...cacheConfig });
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model;
    const systemPrompt = request.systemPrompt || '';

    const userMessage = request.messages.find(m => m.role === 'user');
    if (!userMessage) {
      throw new Error('Request must include at least one user message');
    }

    const cached = this.cache.get(systemPrompt, userMessage.content, temperature, model);
    if (cached) {
      log.debug({ model, cache: this.cache.getStats() }, 'cache hit');
      return cached;
    }

    const start = Date.now();
    log.debug(
      { provider: this.config.provider, model, temperature, maxTokens, messages: request.messages.length },
      'request start'
    );

    const response = this.config.provider === 'anthropic'
      ? await this.callAnthropic(request, temperature, maxTokens, model)
      : await this.callOpenAI(request, temperature, maxTokens, model);

    log.debug(
      {
        model: response.model,
        finishReason: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'request end'
    );

    this.cache.set(systemPrompt, userMessage.content, temperature, model, response);

    return response;
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    const messages = request.messages
      .filter(isConversationMessage)
      .map(m => ({ role: m.role, content: m.content }));

    const response = await this.anthropicClient.messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      system: request.systemPrompt || '',
      messages
    });

    const content = response.content[0];
    if (!content || content.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }

    return {
      content: content.text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    for (const message of request.messages) {
      if (message.role === 'system') {
        messages.push({ role: 'system', content: message.content });
      } else if (message.role === 'assistant') {
        messages.push({ role: 'assistant', content: message.content });
      } else {
        messages.push({ role: 'user', content: message.content });
      }
    }

    const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    };

    // JSON mode only when the prompt explicitly asks for JSON
    const hasJsonRequest = messages.some(message => {
      const content = typeof message.content === 'string' ? message.content : '';
      return /return.*json|respond.*json|output.*json|format.*json/i.test(content);
    });

    if (hasJsonRequest && supportsJsonMode(model)) {
      requestOptions.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(requestOptions);

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice.finish_reason || undefined
    };
  }

  /**
   * Parse JSON response from LLM, handling potential formatting issues
   */
  parseJsonResponse(text: string): unknown {
    return parseJsonText(text);
  }

  /**
   * Get cache statistics
   */
  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }

  /**
   * Get current configuration
   */
  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

function supportsJsonMode(model: string): boolean {
  return model.includes('gpt-4-turbo') ||
    model.includes('gpt-4o') ||
    model.includes('gpt-4.1') ||
    model.includes('gpt-3.5-turbo-1106') ||
    model.includes('gpt-3.5-turbo-0125');
}

/**
 * Parse model output as JSON.
 *
 * Tries, in order: the text with markdown fences removed, the outermost
 * brace-delimited slice, and a jsonrepair pass over that slice.
 */
export function parseJsonText(text: string): unknown {
  const cleanText = text
    .trim()
    .replace(/^```json\s*/i, '')
    .replace(/^```\s*/, '')
    .replace(/\s*```$/, '')
    .trim();

  try {
    return JSON.parse(cleanText);
  } catch (error) {
    const firstBrace = text.indexOf('{');
    const lastBrace = text.lastIndexOf('}');
    const candidate = firstBrace !== -1 && lastBrace > firstBrace
      ? text.substring(firstBrace, lastBrace + 1)
      : cleanText;

    try {
      return JSON.parse(candidate);
    } catch {
      // fall through to repair
    }

    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      // fall through to detailed error
    }

    const errorMsg = error instanceof Error ? error.message : 'Unknown error';
    const preview = text.substring(0, 500);
    throw new Error(
      `Failed to parse LLM response as JSON: ${errorMsg}\n\nResponse preview (first 500 chars):\n${preview}`
    );
  }
}

/**
 * Tests for the provider dispatch of the LLM client
 *
 * Both SDKs are replaced with in-process fakes.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LLMClient } from '../../shared/llm/client';
import { DEFAULT_LLM_CONFIG } from '../../shared/llm/types';

const { createCompletion, createMessage } = vi.hoisted(() => ({
  createCompletion: vi.fn(),
  createMessage: vi.fn()
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
  }
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: createMessage };
  }
}));

describe('LLMClient', () => {
  beforeEach(() => {
    createCompletion.mockReset();
    createMessage.mockReset();
  });

  it('should merge the provider defaults', () => {
    const client = new LLMClient({ apiKey: 'test-secret', provider: 'openai', temperature: 0.1 });

    expect(client.getConfig()).toEqual({
      ...DEFAULT_LLM_CONFIG.openai,
      apiKey: 'test-secret',
      temperature: 0.1
    });
  });

  it('should require a user message', async () => {
    const client = new LLMClient({ apiKey: 'test-secret', provider: 'openai' });

    await expect(client.complete({ systemPrompt: 'System', messages: [] }))
      .rejects.toThrow('Request must include at least one user message');
  });

  describe('openai', () => {
    beforeEach(() => {
      createCompletion.mockResolvedValue({
        model: 'gpt-4o-mini',
        choices: [{ message: { content: '{"ok": true}' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 5, completion_tokens: 3, total_tokens: 8 }
      });
    });

    it('should send the system prompt first and ask for JSON output', async () => {
      const client = new LLMClient({ apiKey: 'test-secret', provider: 'openai', model: 'gpt-4o-mini' });

      const response = await client.complete({
        systemPrompt: 'You parse postings.',
        messages: [{ role: 'user', content: 'Return the result as JSON.' }]
      });

      expect(createCompletion).toHaveBeenCalledWith({
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'You parse postings.' },
          { role: 'user', content: 'Return the result as JSON.' }
        ],
        temperature: DEFAULT_LLM_CONFIG.openai.temperature,
        max_tokens: DEFAULT_LLM_CONFIG.openai.maxTokens,
        response_format: { type: 'json_object' }
      });
      expect(response).toEqual({
        content: '{"ok": true}',
        model: 'gpt-4o-mini',
        usage: { inputTokens: 5, outputTokens: 3, totalTokens: 8 },
        finishReason: 'stop'
      });
    });

    it('should answer repeated requests from the cache', async () => {
      const client = new LLMClient({ apiKey: 'test-secret', provider: 'openai' });
      const request = { systemPrompt: 'System', messages: [{ role: 'user' as const, content: 'Hello' }] };

      await client.complete(request);
      await client.complete(request);

      expect(createCompletion).toHaveBeenCalledTimes(1);
      expect(client.getCacheStats().size).toBe(1);
    });

    it('should reject empty completions', async () => {
      createCompletion.mockResolvedValue({ model: 'gpt-4o-mini', choices: [] });
      const client = new LLMClient({ apiKey: 'test-secret', provider: 'openai' }, { enabled: false });

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hello' }] }))
        .rejects.toThrow('No content in OpenAI response');
    });
  });

  describe('anthropic', () => {
    it('should pass the system prompt separately', async () => {
      createMessage.mockResolvedValue({
        model: 'claude-test',
        content: [{ type: 'text', text: 'Hi' }],
        usage: { input_tokens: 2, output_tokens: 1 },
        stop_reason: 'end_turn'
      });
      const client = new LLMClient({ apiKey: 'test-secret', provider: 'anthropic', model: 'claude-test' });

      const response = await client.complete({
        systemPrompt: 'Be brief.',
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0,
        maxTokens: 50
      });

      expect(createMessage).toHaveBeenCalledWith({
        model: 'claude-test',
        max_tokens: 50,
        temperature: 0,
        system: 'Be brief.',
        messages: [{ role: 'user', content: 'Hello' }]
      });
      expect(response).toEqual({
        content: 'Hi',
        model: 'claude-test',
        usage: { inputTokens: 2, outputTokens: 1, totalTokens: 3 },
        finishReason: 'end_turn'
      });
    });

    it('should reject non-text content', async () => {
      createMessage.mockResolvedValue({
        model: 'claude-test',
        content: [{ type: 'tool_use' }],
        usage: { input_tokens: 2, output_tokens: 1 },
        stop_reason: 'tool_use'
      });
      const client = new LLMClient({ apiKey: 'test-secret', provider: 'anthropic' });

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hello' }] }))
        .rejects.toThrow('Unexpected response type from Anthropic');
    });
  });
});

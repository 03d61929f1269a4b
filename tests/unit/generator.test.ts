/**
 * Unit Tests for Message Generator Module
 */

import { jest, describe, it, expect } from '@jest/globals';
import {
  AnthropicCompletionClient,
  MessageGenerator,
  buildPrompt,
  buildSubjectPrompt,
  cleanSubject,
  type AnthropicApi,
} from '../../src/generator/index.js';
import type { Metrics } from '../../src/logger/index.js';
import { FakeCompletionClient, createRecordingLogger } from '../helpers.js';

// ============================================================================
// Test Fixtures
// ============================================================================

type CreateMessage = AnthropicApi['messages']['create'];
type CreateResult = Awaited<ReturnType<CreateMessage>>;

function textResponse(text: string): CreateResult {
  return {
    content: [{ type: 'text', text }],
    usage: { input_tokens: 12, output_tokens: 34 },
    stop_reason: 'end_turn',
  };
}

function createFakeApi(create: CreateMessage, modelIds: string[] = ['claude-test-model']): AnthropicApi {
  return {
    messages: { create },
    models: { list: async () => ({ data: modelIds.map((id) => ({ id })) }) },
  };
}

function rateLimitError(): Error {
  return Object.assign(new Error('429 {"type":"error","error":{"type":"rate_limit_error"}}'), { status: 429 });
}

const config = { apiKey: 'test-secret', model: 'claude-test-model', maxTokens: 256, timeoutMs: 1000 };

function createRecordingMetrics(): Metrics & { increments: string[] } {
  const increments: string[] = [];
  return {
    increments,
    increment: (metric: string) => {
      increments.push(metric);
    },
    timing: () => undefined,
  };
}

// ============================================================================
// Prompt envelopes
// ============================================================================

describe('buildPrompt', () => {
  it('embeds the formal tone by default', () => {
    const prompt = buildPrompt('email', { prompt: 'invite team to Friday 2pm kickoff' });
    expect(prompt.split('\n').slice(0, 2)).toEqual([
      'Create a formal and professional email message based on this instruction:',
      '"invite team to Friday 2pm kickoff"',
    ]);
    expect(prompt).toContain('- formal and professional in tone');
  });

  it('embeds the informal tone', () => {
    const prompt = buildPrompt('email', { prompt: 'lunch on Thursday?', tone: 'informal' });
    expect(prompt.split('\n')[0]).toBe('Create a friendly and conversational email message based on this instruction:');
  });

  it('embeds personalization fields', () => {
    const prompt = buildPrompt('email', {
      prompt: 'quarterly review',
      recipientName: 'Alex',
      senderName: 'Jordan',
      senderDesignation: 'Head of Sales',
    });
    expect(prompt).toContain('- Address the recipient by name: Alex');
    expect(prompt).toContain('- Sign off as Jordan, Head of Sales');
  });

  it('omits personalization lines when none are given', () => {
    expect(buildPrompt('email', { prompt: 'hello' })).not.toContain('Sign off as');
  });

  it('uses channel-specific envelopes', () => {
    expect(buildPrompt('slack', { prompt: 'deploy done' }).split('\n')[0]).toBe(
      'Create a professional and friendly Slack message based on this instruction:'
    );
    expect(buildPrompt('whatsapp', { prompt: 'order shipped' }).split('\n')[0]).toBe(
      'Create a professional WhatsApp message based on this instruction:'
    );
    expect(buildPrompt('linkedin_post', { prompt: 'we are hiring' }).split('\n')[0]).toBe(
      'Create a LinkedIn post based on the following prompt:'
    );
  });

  it('keeps connection notes short', () => {
    expect(buildPrompt('linkedin_connection_note', { prompt: 'connect' })).toContain(
      '2. Concise (under 300 characters, it is a connection request note)'
    );
    expect(buildPrompt('linkedin_message', { prompt: 'follow up' })).toContain('2. Concise (under 1000 characters)');
  });
});

describe('cleanSubject', () => {
  it('strips surrounding quotes of every style', () => {
    expect(cleanSubject('"Friday Kickoff Meeting Invitation"')).toBe('Friday Kickoff Meeting Invitation');
    expect(cleanSubject("'Friday Kickoff'")).toBe('Friday Kickoff');
    expect(cleanSubject('“Friday Kickoff”')).toBe('Friday Kickoff');
    expect(cleanSubject('‘Friday Kickoff’')).toBe('Friday Kickoff');
  });

  it('strips a subject label and nested quotes', () => {
    expect(cleanSubject('Subject: "\'Team Kickoff This Friday\'"')).toBe('Team Kickoff This Friday');
  });

  it('keeps inner quotes', () => {
    expect(cleanSubject('The "New" Roadmap Review')).toBe('The "New" Roadmap Review');
  });
});

// ============================================================================
// Generator
// ============================================================================

describe('MessageGenerator', () => {
  it('returns trimmed generated content', async () => {
    const client = new FakeCompletionClient(() => '\n  Hi team, see you Friday at 2pm.  \n');
    const generator = new MessageGenerator(client);

    const result = await generator.generate('email', { prompt: 'invite team to Friday 2pm kickoff', tone: 'formal' });

    expect(result).toEqual({
      success: true,
      message: 'Generated email',
      content: 'Hi team, see you Friday at 2pm.',
    });
    expect(client.prompts).toHaveLength(1);
  });

  it('reports provider errors with the provider message', async () => {
    const client = new FakeCompletionClient(() => {
      throw new Error('invalid x-api-key');
    });
    const logger = createRecordingLogger();
    const generator = new MessageGenerator(client, { logger });

    const result = await generator.generate('slack', { prompt: 'deploy done' });

    expect(result).toEqual({ success: false, error: 'Error generating message: invalid x-api-key' });
    expect(logger.logs.some((entry) => entry.level === 'error')).toBe(true);
  });

  it('treats an empty completion as a failure', async () => {
    const generator = new MessageGenerator(new FakeCompletionClient(() => '   '));
    const result = await generator.generate('linkedin_post', { prompt: 'we are hiring' });
    expect(result).toEqual({ success: false, error: 'Error generating post: Empty response from language model' });
  });

  it('does not retry failed generations', async () => {
    const respond = jest.fn((): string => {
      throw new Error('overloaded');
    });
    const generator = new MessageGenerator(new FakeCompletionClient(respond));

    await generator.generate('whatsapp', { prompt: 'order shipped' });

    expect(respond).toHaveBeenCalledTimes(1);
  });

  it('records metrics', async () => {
    const metrics = createRecordingMetrics();
    const generator = new MessageGenerator(new FakeCompletionClient(), { metrics });

    await generator.generate('email', { prompt: 'hello' });

    expect(metrics.increments).toEqual(['generator.requests']);
  });

  describe('generateSubject', () => {
    it('cleans the generated subject', async () => {
      const client = new FakeCompletionClient(() => 'Subject: "Friday 2pm Team Kickoff"');
      const result = await new MessageGenerator(client).generateSubject('invite team to Friday 2pm kickoff');

      expect(result).toEqual({ success: true, message: 'Generated subject', content: 'Friday 2pm Team Kickoff' });
      expect(client.prompts[0]).toBe(buildSubjectPrompt('invite team to Friday 2pm kickoff'));
    });

    it('fails on an empty subject', async () => {
      const result = await new MessageGenerator(new FakeCompletionClient(() => '""')).generateSubject('hello');
      expect(result).toEqual({
        success: false,
        error: 'Error generating subject: Empty response from language model',
      });
    });
  });

  describe('checkConnection', () => {
    it('reports the number of models', async () => {
      const client = new FakeCompletionClient();
      client.models = ['claude-a', 'claude-b'];
      const result = await new MessageGenerator(client).checkConnection();
      expect(result).toEqual({ success: true, message: 'Connected, 2 models available', modelsAvailable: 2 });
    });

    it('reports provider failures', async () => {
      const client = new FakeCompletionClient();
      client.modelsError = new Error('authentication_error');
      expect(await new MessageGenerator(client).checkConnection()).toEqual({
        success: false,
        error: 'authentication_error',
      });
    });
  });
});

// ============================================================================
// Anthropic client
// ============================================================================

describe('AnthropicCompletionClient', () => {
  it('sends the prompt and returns the first text block', async () => {
    const create = jest.fn<CreateMessage>(async () => textResponse('Drafted text'));
    const client = new AnthropicCompletionClient(config, { client: createFakeApi(create) });

    await expect(client.complete('Write something')).resolves.toBe('Drafted text');

    const [params] = create.mock.calls[0] ?? [];
    expect(params?.model).toBe('claude-test-model');
    expect(params?.max_tokens).toBe(256);
    expect(params?.messages).toEqual([{ role: 'user', content: 'Write something' }]);
  });

  it('returns an empty string when no text block comes back', async () => {
    const create = jest.fn<CreateMessage>(async () => ({ content: [{ type: 'tool_use' }] }));
    const client = new AnthropicCompletionClient(config, { client: createFakeApi(create) });

    await expect(client.complete('Write something')).resolves.toBe('');
  });

  it('surfaces a rate-limit error after a single call', async () => {
    const create = jest
      .fn<CreateMessage>()
      .mockRejectedValueOnce(rateLimitError())
      .mockResolvedValueOnce(textResponse('Too late'));
    const metrics = createRecordingMetrics();
    const client = new AnthropicCompletionClient(config, { client: createFakeApi(create), metrics });

    await expect(client.complete('Write something')).rejects.toThrow('rate_limit_error');
    expect(create).toHaveBeenCalledTimes(1);
    expect(metrics.increments).toEqual(['generator.claude.calls', 'generator.claude.errors']);
  });

  it('turns a rate-limited draft into a failure without retrying', async () => {
    const create = jest
      .fn<CreateMessage>()
      .mockRejectedValueOnce(rateLimitError())
      .mockResolvedValueOnce(textResponse('Hello team'));
    const generator = new MessageGenerator(new AnthropicCompletionClient(config, { client: createFakeApi(create) }));

    const result = await generator.generate('email', { prompt: 'invite team to Friday 2pm kickoff' });

    expect(result).toEqual({
      success: false,
      error: 'Error generating email: 429 {"type":"error","error":{"type":"rate_limit_error"}}',
    });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('surfaces other errors', async () => {
    const create = jest.fn<CreateMessage>(async () => {
      throw Object.assign(new Error('invalid_request_error'), { status: 400 });
    });
    const logger = createRecordingLogger();
    const client = new AnthropicCompletionClient(config, { client: createFakeApi(create), logger });

    await expect(client.complete('Write something')).rejects.toThrow('invalid_request_error');
    expect(logger.logs.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
      'Claude API call failed',
    ]);
  });

  it('lists model identifiers', async () => {
    const create = jest.fn<CreateMessage>(async () => textResponse(''));
    const client = new AnthropicCompletionClient(config, { client: createFakeApi(create, ['m-1', 'm-2']) });
    await expect(client.listModels()).resolves.toEqual(['m-1', 'm-2']);
  });
});

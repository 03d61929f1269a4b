/**
 * Message Generator Module
 *
 * Wraps the LLM provider to draft outbound messages from a short prompt.
 *
 * Responsibilities:
 * - Build an instruction envelope per message kind (tone, personalization)
 * - Claude API integration with @anthropic-ai/sdk
 * - Subject-line generation with quote/label stripping
 * - Connectivity check for the detailed health check
 *
 * Nothing here retries: each draft is a single provider call, and a failed
 * draft comes back as { success: false, error } with the provider message
 * attached.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type { Logger, Metrics } from '../logger/index.js';
import { noopMetrics, silentLogger } from '../logger/index.js';
import type { GeneratedText, GenerationRequest, MessageKind, ServiceResult } from '../types/index.js';
import { errorMessage, failure } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Minimal text-completion contract the generator depends on
 */
export interface CompletionClient {
  /** Returns the first text block of the completion, possibly empty */
  complete(prompt: string): Promise<string>;
  /** Model identifiers visible to the configured key */
  listModels(): Promise<string[]>;
}

export interface AnthropicClientConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  temperature?: number;
}

/**
 * The slice of the Anthropic SDK this module calls
 */
export interface AnthropicApi {
  messages: {
    create(body: MessageCreateParamsNonStreaming): PromiseLike<{
      content: Array<{ type: string; text?: string }>;
      usage?: { input_tokens: number; output_tokens: number };
      stop_reason?: string | null;
    }>;
  };
  models: {
    list(): PromiseLike<{ data: Array<{ id: string }> }>;
  };
}

export interface AnthropicClientOptions {
  client?: AnthropicApi;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TEMPERATURE = 0.7;

/** Subject used when subject generation fails */
export const DEFAULT_EMAIL_SUBJECT = 'Quick update';

const SYSTEM_PROMPT =
  'You write outbound messages on behalf of the user. Reply with the requested text only, as plain text: no preamble, no commentary, no markdown code fences.';

const KIND_LABELS: Record<MessageKind, string> = {
  email: 'email',
  slack: 'message',
  whatsapp: 'message',
  linkedin_message: 'message',
  linkedin_post: 'post',
  linkedin_connection_note: 'connection note',
};

// ============================================================================
// Anthropic client
// ============================================================================

/**
 * CompletionClient backed by the Anthropic Messages API
 */
export class AnthropicCompletionClient implements CompletionClient {
  private readonly client: AnthropicApi;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(private readonly config: AnthropicClientConfig, options: AnthropicClientOptions = {}) {
    // One attempt per draft; the SDK's own retries are disabled
    this.client =
      options.client ??
      new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  async complete(prompt: string): Promise<string> {
    const { model, maxTokens } = this.config;
    const temperature = this.config.temperature ?? DEFAULT_TEMPERATURE;
    const startTime = Date.now();

    this.logger.debug('Calling Claude API', { model, maxTokens, promptLength: prompt.length });
    this.metrics.increment('generator.claude.calls', { model });

    try {
      const response = await this.client.messages.create({
        model,
        max_tokens: maxTokens,
        temperature,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
      });

      const textBlock = response.content.find((block) => block.type === 'text');

      this.logger.debug('Claude API response received', {
        model,
        inputTokens: response.usage?.input_tokens,
        outputTokens: response.usage?.output_tokens,
        stopReason: response.stop_reason,
      });
      this.metrics.timing('generator.claude.duration', Date.now() - startTime, { model });

      return textBlock && textBlock.type === 'text' ? textBlock.text ?? '' : '';
    } catch (error) {
      this.metrics.increment('generator.claude.errors', { model });
      this.logger.warn('Claude API call failed', { model, error: errorMessage(error) });
      throw error;
    }
  }

  async listModels(): Promise<string[]> {
    const page = await this.client.models.list();
    return page.data.map((model) => model.id);
  }
}

// ============================================================================
// Prompt envelopes
// ============================================================================

function personalizationLines(request: GenerationRequest): string[] {
  const lines: string[] = [];
  if (request.recipientName) {
    lines.push(`- Address the recipient by name: ${request.recipientName}`);
  }
  if (request.senderName && request.senderDesignation) {
    lines.push(`- Sign off as ${request.senderName}, ${request.senderDesignation}`);
  } else if (request.senderName) {
    lines.push(`- Sign off as ${request.senderName}`);
  } else if (request.senderDesignation) {
    lines.push(`- Sign off with the sender's title: ${request.senderDesignation}`);
  }
  return lines;
}

/**
 * Build the instruction envelope sent to the LLM for a message kind
 */
export function buildPrompt(kind: MessageKind, request: GenerationRequest): string {
  const prompt = request.prompt.trim();

  switch (kind) {
    case 'email': {
      const tone = request.tone === 'informal' ? 'friendly and conversational' : 'formal and professional';
      return [
        `Create a ${tone} email message based on this instruction:`,
        `"${prompt}"`,
        '',
        'The email should be:',
        '- Clear and concise',
        `- ${tone} in tone`,
        '- Include appropriate greeting and sign-off',
        '- Include any important details mentioned in the instruction',
        '- Well-structured with paragraphs as needed',
        ...personalizationLines(request),
        '',
        'Return only the email body text, nothing else.',
      ].join('\n');
    }

    case 'slack':
      return [
        'Create a professional and friendly Slack message based on this instruction:',
        `"${prompt}"`,
        '',
        'The message should be:',
        '- Clear and concise',
        '- Professional but conversational in tone',
        '- Include any important details mentioned in the instruction',
        '- Formatted appropriately for Slack (can include emojis if suitable)',
        '',
        'Return only the message text, nothing else.',
      ].join('\n');

    case 'whatsapp':
      return [
        'Create a professional WhatsApp message based on this instruction:',
        `"${prompt}"`,
        '',
        'The message should be:',
        '- Clear and concise',
        '- Professional in tone',
        '- Well-structured with paragraphs as needed',
        '- Appropriate for WhatsApp (not too formal, but still professional)',
        '- Include any important details mentioned in the instruction',
        '',
        'Return only the message text, nothing else.',
      ].join('\n');

    case 'linkedin_message':
    case 'linkedin_connection_note':
      return [
        'Create a professional LinkedIn message based on the following prompt:',
        '',
        prompt,
        '',
        'The message should be:',
        '1. Professional and appropriate for LinkedIn',
        kind === 'linkedin_connection_note'
          ? '2. Concise (under 300 characters, it is a connection request note)'
          : '2. Concise (under 1000 characters)',
        '3. Personalized and engaging',
        '4. Free of hashtags unless specifically requested',
        '5. Include a clear call to action when appropriate',
        '',
        'Return only the message text, nothing else.',
      ].join('\n');

    case 'linkedin_post':
      return [
        'Create a LinkedIn post based on the following prompt:',
        '',
        prompt,
        '',
        'The post should be:',
        '1. Professional and appropriate for LinkedIn',
        '2. Engaging from the first line',
        '3. Under 3000 characters',
        '4. Using at most three relevant hashtags, placed at the end',
        '',
        'Return only the post text, nothing else.',
      ].join('\n');
  }
}

export function buildSubjectPrompt(prompt: string): string {
  return [
    'Write a short email subject line (5 to 8 words) for an email based on this instruction:',
    `"${prompt.trim()}"`,
    '',
    'Return only the subject line, without quotes.',
  ].join('\n');
}

const QUOTE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
  ['‘', '’'],
];

/**
 * Strip a leading "Subject:" label and any surrounding quote pair
 */
export function cleanSubject(raw: string): string {
  let subject = raw.trim().replace(/^subject\s*:\s*/i, '').trim();

  let stripped = true;
  while (stripped && subject.length >= 2) {
    stripped = false;
    for (const [open, close] of QUOTE_PAIRS) {
      if (subject.startsWith(open) && subject.endsWith(close)) {
        subject = subject.slice(open.length, subject.length - close.length).trim();
        stripped = true;
        break;
      }
    }
  }

  return subject;
}

// ============================================================================
// Generator
// ============================================================================

export interface MessageGeneratorOptions {
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Drafts message text for every channel
 */
export class MessageGenerator {
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(private readonly client: CompletionClient, options: MessageGeneratorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  async generate(kind: MessageKind, request: GenerationRequest): Promise<GeneratedText> {
    const label = KIND_LABELS[kind];
    const startTime = Date.now();
    this.metrics.increment('generator.requests', { kind });

    try {
      const text = (await this.client.complete(buildPrompt(kind, request))).trim();
      if (!text) {
        throw new Error('Empty response from language model');
      }

      this.metrics.timing('generator.duration', Date.now() - startTime, { kind });
      this.logger.info(`Generated ${label}`, { kind, length: text.length });
      return { success: true, message: `Generated ${label}`, content: text };
    } catch (error) {
      this.metrics.increment('generator.failures', { kind });
      this.logger.error(`Error generating ${label}`, { kind, error: errorMessage(error) });
      return failure(`Error generating ${label}: ${errorMessage(error)}`);
    }
  }

  async generateSubject(prompt: string): Promise<GeneratedText> {
    try {
      const subject = cleanSubject(await this.client.complete(buildSubjectPrompt(prompt)));
      if (!subject) {
        throw new Error('Empty response from language model');
      }
      return { success: true, message: 'Generated subject', content: subject };
    } catch (error) {
      this.logger.warn('Error generating subject', { error: errorMessage(error) });
      return failure(`Error generating subject: ${errorMessage(error)}`);
    }
  }

  async checkConnection(): Promise<ServiceResult<{ modelsAvailable: number }>> {
    try {
      const models = await this.client.listModels();
      return {
        success: true,
        message: `Connected, ${models.length} models available`,
        modelsAvailable: models.length,
      };
    } catch (error) {
      return failure(errorMessage(error));
    }
  }
}

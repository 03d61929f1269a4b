/**
 * Slack Delivery Service
 *
 * - Setup links a workspace through the connector platform
 * - Channel listing talks to the Slack Web API directly with the caller's
 *   bot token; without one it serves the static channel directory
 * - Sends go through the connector platform with a bot token that is either
 *   supplied or remembered from an earlier call for the same channel
 *
 * Slack API failures are classified into actionable messages and returned
 * as a single `{ id: "ERROR", name: <message> }` entry instead of throwing.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ChannelDirectory } from '../config/index.js';
import type { ConnectorClient } from '../connector/index.js';
import { normalizeActionResponse, setupConnection } from '../connector/index.js';
import { CredentialCache, isPlaceholderSecret } from '../credential-cache/index.js';
import type { Logger } from '../logger/index.js';
import { silentLogger } from '../logger/index.js';
import type { EntityId, ServiceResult, SetupResult } from '../types/index.js';
import { CHANNEL_LABELS, DEFAULT_ENTITY_ID, errorMessage, failure } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface SlackChannel {
  id: string;
  name: string;
}

export interface ResolvedChannel {
  id: string;
  name?: string | undefined;
}

export interface SlackDelivery {
  channelId: string;
  text: string;
  botToken?: string | undefined;
  channelName?: string | undefined;
  entityId?: EntityId | undefined;
}

interface SlackApiResponse {
  ok?: boolean;
  error?: string;
  team?: string;
  channels?: Array<{ id?: unknown; name?: unknown }>;
}

export interface SlackServiceOptions {
  /** Static directory served when no bot token is supplied */
  directory?: ChannelDirectory;
  /** Bot token from configuration, used for health checks */
  botToken?: string | undefined;
  http?: AxiosInstance;
  credentials?: CredentialCache;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

export const SLACK_API_URL = 'https://slack.com/api';
export const SLACK_SEND_ACTION = 'SLACK_SENDS_A_MESSAGE_TO_A_SLACK_CHANNEL';
export const ERROR_CHANNEL_ID = 'ERROR';

export const NO_BOT_TOKEN_ERROR =
  'No valid bot token provided or found in cache. Please provide a bot token or first call the channels endpoint with a valid token.';

const SLACK_TIMEOUT_MS = 10000;

/**
 * Turn a Slack Web API error code into a message a caller can act on
 */
export function classifySlackError(code: string): string {
  switch (code) {
    case 'missing_scope':
      return 'Bot token missing required scopes: channels:read, groups:read';
    case 'invalid_auth':
    case 'not_authed':
      return 'Invalid or expired bot token';
    default:
      return `Slack API error: ${code}`;
  }
}

/**
 * Create the Slack Web API client; every status reaches the caller
 */
export function createSlackHttpClient(): AxiosInstance {
  return axios.create({
    baseURL: SLACK_API_URL,
    timeout: SLACK_TIMEOUT_MS,
    validateStatus: () => true,
  });
}

function errorChannel(name: string): SlackChannel[] {
  return [{ id: ERROR_CHANNEL_ID, name }];
}

// ============================================================================
// Service
// ============================================================================

export class SlackService {
  private readonly directory: ChannelDirectory;
  private readonly botToken: string | undefined;
  private readonly http: AxiosInstance;
  private readonly credentials: CredentialCache;
  private readonly logger: Logger;

  constructor(private readonly connector: ConnectorClient, options: SlackServiceOptions = {}) {
    this.directory = options.directory ?? {};
    this.botToken = options.botToken;
    this.http = options.http ?? createSlackHttpClient();
    this.logger = options.logger ?? silentLogger;
    this.credentials = options.credentials ?? new CredentialCache({ kind: 'bot token', logger: this.logger });
  }

  setup(entityId: EntityId = DEFAULT_ENTITY_ID): Promise<SetupResult> {
    return setupConnection(this.connector, 'slack', entityId, undefined, CHANNEL_LABELS.slack, this.logger);
  }

  /**
   * List channels visible to a bot token, or the static directory without one
   */
  async listChannels(botToken?: string): Promise<SlackChannel[]> {
    if (botToken === undefined || isPlaceholderSecret(botToken)) {
      return Object.values(this.directory).map(({ id, name }) => ({ id, name }));
    }

    try {
      this.logger.debug('Listing Slack channels');
      const response = await this.http.get<SlackApiResponse>('/conversations.list', {
        headers: { Authorization: `Bearer ${botToken}` },
        params: {
          types: 'public_channel,private_channel',
          exclude_archived: 'true',
          limit: '1000',
        },
      });

      if (response.status !== 200) {
        this.logger.error('Slack API request failed', { status: response.status });
        return errorChannel(`Slack API request failed with status ${response.status}`);
      }

      const data = response.data;
      if (!data.ok) {
        const code = data.error ?? 'unknown_error';
        this.logger.error('Slack API error', { error: code });
        return errorChannel(classifySlackError(code));
      }

      const channels: SlackChannel[] = [];
      for (const channel of data.channels ?? []) {
        if (typeof channel.id === 'string' && typeof channel.name === 'string') {
          this.credentials.store(channel.id, botToken);
          channels.push({ id: channel.id, name: channel.name });
        }
      }

      this.logger.info('Listed Slack channels', { count: channels.length });
      return channels;
    } catch (error) {
      this.logger.error('Could not reach Slack API', { error: errorMessage(error) });
      return errorChannel(`Could not reach Slack API: ${errorMessage(error)}`);
    }
  }

  /**
   * Resolve a directory key, a channel name (with or without "#") or a raw id
   */
  resolveChannel(idOrKey: string): ResolvedChannel {
    const value = idOrKey.trim();

    const byKey = Object.hasOwn(this.directory, value) ? this.directory[value] : undefined;
    if (byKey) return { id: byKey.id, name: byKey.name };

    const name = value.replace(/^#/, '');
    const byName = Object.values(this.directory).find((entry) => entry.name === name);
    if (byName) return { id: byName.id, name: byName.name };

    const byId = Object.values(this.directory).find((entry) => entry.id === value);
    return { id: value, name: byId?.name };
  }

  async send(delivery: SlackDelivery): Promise<ServiceResult> {
    const channelId = delivery.channelId.trim();
    if (!channelId) {
      return failure('Channel ID is required');
    }

    const token = this.credentials.resolve(channelId, delivery.botToken);
    if (!token) {
      return failure(NO_BOT_TOKEN_ERROR);
    }

    const display = delivery.channelName ?? channelId;
    this.logger.info('Sending Slack message', { channel: display, length: delivery.text.length });

    try {
      const raw = await this.connector.executeAction(
        SLACK_SEND_ACTION,
        { channel: channelId, text: delivery.text, token },
        { entityId: delivery.entityId ?? DEFAULT_ENTITY_ID }
      );

      const result = normalizeActionResponse(raw);
      if (!result.success) {
        this.logger.warn('Slack send rejected', { channel: display, error: result.error });
        return failure(`Failed to send message via connector platform: ${result.error}`);
      }

      return { success: true, message: `Message successfully sent to #${display}` };
    } catch (error) {
      this.logger.error('Error using connector platform for Slack', { error: errorMessage(error) });
      return failure(`Error using connector platform for Slack: ${errorMessage(error)}`);
    }
  }

  /**
   * Check the configured bot token with auth.test
   */
  async checkConnection(): Promise<ServiceResult<{ team?: string | undefined }>> {
    if (!this.botToken) {
      return failure('SLACK_BOT_TOKEN is not configured');
    }

    try {
      const response = await this.http.get<SlackApiResponse>('/auth.test', {
        headers: { Authorization: `Bearer ${this.botToken}` },
      });

      if (response.status !== 200) {
        return failure(`Slack API request failed with status ${response.status}`);
      }
      if (!response.data.ok) {
        return failure(classifySlackError(response.data.error ?? 'unknown_error'));
      }

      const team = response.data.team;
      return {
        success: true,
        message: team ? `Connected to workspace ${team}` : 'Connected',
        team,
      };
    } catch (error) {
      return failure(`Could not reach Slack API: ${errorMessage(error)}`);
    }
  }
}

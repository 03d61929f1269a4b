/**
 * Connector Module
 *
 * Client for the connector platform that brokers the mail, chat,
 * messaging-app and professional-network integrations.
 *
 * The platform's response schema is not contractually stable: the same
 * outcome arrives as `successful`, `successfull`, `success` or a bare
 * `data` payload depending on toolkit and version. Every call site goes
 * through normalizeActionResponse / normalizeConnectionResponse instead of
 * probing shapes itself.
 *
 * Action names are not stable either. executeWithFallback walks an ordered
 * list of candidate names and keeps the first one that does not throw. It
 * is a name-resolution workaround, not a retry policy: no waiting, and no
 * name is attempted twice.
 */

import axios, { type AxiosInstance } from 'axios';
import type { Logger } from '../logger/index.js';
import { silentLogger } from '../logger/index.js';
import type { ChannelName, EntityId, SetupResult } from '../types/index.js';
import { errorMessage, failure } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ExecuteOptions {
  entityId: EntityId;
  connectedAccountId?: string | undefined;
}

export interface RawActionSummary {
  name: string;
  description?: string | undefined;
}

/**
 * Connector platform operations used by the delivery services
 */
export interface ConnectorClient {
  initiateConnection(
    toolkit: ChannelName,
    entityId: EntityId,
    params?: Record<string, string>
  ): Promise<unknown>;
  getConnectedAccount(id: string): Promise<unknown>;
  executeAction(action: string, args: Record<string, unknown>, options: ExecuteOptions): Promise<unknown>;
  listActions(toolkit: ChannelName): Promise<RawActionSummary[]>;
}

export type NormalizedActionResponse =
  | { success: true; data: unknown }
  | { success: false; error: string };

export interface NormalizedConnection {
  redirectUrl?: string | undefined;
  connectedAccountId?: string | undefined;
  status?: string | undefined;
}

export interface ConnectorConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  authConfigIds: Partial<Record<ChannelName, string>>;
}

/**
 * A connector platform request that failed at the HTTP level
 */
export class ConnectorRequestError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ConnectorRequestError';
  }
}

/**
 * Every candidate action name threw
 */
export class ActionFallbackError extends Error {
  constructor(readonly attempts: ReadonlyArray<{ action: string; error: string }>) {
    super(
      `All candidate actions failed: ${attempts.map((a) => `${a.action} (${a.error})`).join('; ')}`
    );
    this.name = 'ActionFallbackError';
  }
}

export const UNKNOWN_RESPONSE_ERROR = 'Unknown error in response format';

// ============================================================================
// Response normalization
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasPayload(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === '' || value === 0) {
    return false;
  }
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Pull a printable error out of a provider response
 */
export function extractError(raw: unknown): string {
  if (!isRecord(raw)) return UNKNOWN_RESPONSE_ERROR;

  const { error } = raw;
  if (typeof error === 'string' && error.trim()) return error;
  if (isRecord(error) && typeof error.message === 'string' && error.message.trim()) {
    return error.message;
  }
  return UNKNOWN_RESPONSE_ERROR;
}

/**
 * Map any action response onto success/failure
 *
 * Indicators are checked in order: `successful`, `successfull`, `success`,
 * then a non-empty `data` payload.
 */
export function normalizeActionResponse(raw: unknown): NormalizedActionResponse {
  if (isRecord(raw)) {
    if (raw.successful || raw.successfull || raw.success || hasPayload(raw.data)) {
      return { success: true, data: raw.data };
    }
  }
  return { success: false, error: extractError(raw) };
}

/**
 * Map a connection-initiation or connected-account response onto one shape
 */
export function normalizeConnectionResponse(raw: unknown): NormalizedConnection {
  if (!isRecord(raw)) return {};

  return {
    redirectUrl: optionalString(raw.redirect_url) ?? optionalString(raw.redirectUrl),
    connectedAccountId:
      optionalString(raw.id) ??
      optionalString(raw.connectedAccountId) ??
      optionalString(raw.connected_account_id),
    status: optionalString(raw.status) ?? optionalString(raw.connectionStatus),
  };
}

// ============================================================================
// Composio REST client
// ============================================================================

export interface ComposioConnectorOptions {
  http?: AxiosInstance;
  logger?: Logger;
}

interface ToolListResponse {
  items?: Array<{ slug?: string; name?: string; description?: string }>;
}

function describeRequestError(error: unknown): ConnectorRequestError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const body: unknown = error.response?.data;
    const detail = extractError(body);
    const message =
      detail !== UNKNOWN_RESPONSE_ERROR
        ? detail
        : status !== undefined
          ? `Request failed with status ${status}`
          : error.message;
    return new ConnectorRequestError(message, status);
  }
  return new ConnectorRequestError(errorMessage(error));
}

/**
 * Create the connector platform HTTP client
 */
export function createConnectorHttpClient(config: ConnectorConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      'x-api-key': config.apiKey,
    },
  });
}

/**
 * ConnectorClient over the Composio v3 REST API
 */
export class ComposioConnectorClient implements ConnectorClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly config: ConnectorConfig, options: ComposioConnectorOptions = {}) {
    this.http = options.http ?? createConnectorHttpClient(config);
    this.logger = options.logger ?? silentLogger;
  }

  async initiateConnection(
    toolkit: ChannelName,
    entityId: EntityId,
    params?: Record<string, string>
  ): Promise<unknown> {
    const authConfigId = this.config.authConfigIds[toolkit];
    if (!authConfigId) {
      throw new ConnectorRequestError(
        `No auth config for ${toolkit}; set COMPOSIO_${toolkit.toUpperCase()}_AUTH_CONFIG_ID`
      );
    }

    this.logger.debug('Initiating connection', { toolkit, entityId, withParams: params !== undefined });

    try {
      const response = await this.http.post<unknown>('/api/v3/connected_accounts', {
        auth_config: { id: authConfigId },
        connection: params ? { user_id: entityId, data: params } : { user_id: entityId },
      });
      return response.data;
    } catch (error) {
      throw describeRequestError(error);
    }
  }

  async getConnectedAccount(id: string): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(`/api/v3/connected_accounts/${encodeURIComponent(id)}`);
      return response.data;
    } catch (error) {
      throw describeRequestError(error);
    }
  }

  async executeAction(
    action: string,
    args: Record<string, unknown>,
    options: ExecuteOptions
  ): Promise<unknown> {
    this.logger.debug('Executing action', { action, entityId: options.entityId });

    try {
      const response = await this.http.post<unknown>(`/api/v3/tools/execute/${encodeURIComponent(action)}`, {
        user_id: options.entityId,
        ...(options.connectedAccountId ? { connected_account_id: options.connectedAccountId } : {}),
        arguments: args,
      });
      return response.data;
    } catch (error) {
      throw describeRequestError(error);
    }
  }

  async listActions(toolkit: ChannelName): Promise<RawActionSummary[]> {
    try {
      const response = await this.http.get<ToolListResponse>('/api/v3/tools', {
        params: { toolkit_slug: toolkit },
      });
      const items = response.data.items ?? [];
      return items.flatMap((item) => {
        const name = item.slug ?? item.name;
        return name ? [{ name, description: item.description }] : [];
      });
    } catch (error) {
      throw describeRequestError(error);
    }
  }
}

// ============================================================================
// Shared flows
// ============================================================================

/**
 * Try candidate action names in order until one does not throw
 *
 * @throws ActionFallbackError once every candidate has thrown
 */
export async function executeWithFallback(
  client: ConnectorClient,
  candidates: readonly string[],
  args: Record<string, unknown>,
  options: ExecuteOptions,
  logger: Logger = silentLogger
): Promise<{ action: string; response: unknown }> {
  const attempts: Array<{ action: string; error: string }> = [];

  for (const action of candidates) {
    try {
      const response = await client.executeAction(action, args, options);
      if (attempts.length > 0) {
        logger.info('Fallback action name accepted', { action, failedAttempts: attempts.length });
      }
      return { action, response };
    } catch (error) {
      attempts.push({ action, error: errorMessage(error) });
      logger.warn('Action attempt failed', { action, attempt: attempts.length, error: errorMessage(error) });
    }
  }

  throw new ActionFallbackError(attempts);
}

/**
 * Begin linking an external account and report what the caller must do next
 *
 * Connection status is polled once, and only when no redirect is needed.
 */
export async function setupConnection(
  client: ConnectorClient,
  toolkit: ChannelName,
  entityId: EntityId,
  params: Record<string, string> | undefined,
  label: string,
  logger: Logger = silentLogger
): Promise<SetupResult> {
  try {
    const connection = normalizeConnectionResponse(
      await client.initiateConnection(toolkit, entityId, params)
    );

    if (connection.redirectUrl) {
      logger.info(`${label} authentication URL generated`, { entityId });
      return {
        success: true,
        message: `Please complete ${label} authentication by opening this URL in your browser`,
        redirectUrl: connection.redirectUrl,
      };
    }

    if (connection.connectedAccountId) {
      const account = normalizeConnectionResponse(
        await client.getConnectedAccount(connection.connectedAccountId)
      );
      if (account.status === 'ACTIVE') {
        logger.info(`${label} connection is active`, { entityId });
        return { success: true, message: `${label} connection is active` };
      }
    }

    if (params) {
      logger.info(`${label} connection created with API credentials`, { entityId });
      return {
        success: true,
        message: `${label} connection created successfully with your API credentials`,
      };
    }

    logger.warn(`${label} setup returned neither redirect nor active connection`, { entityId });
    return failure(`Failed to setup ${label} integration`);
  } catch (error) {
    logger.error(`Error setting up ${label} integration`, { entityId, error: errorMessage(error) });
    return failure(`Error setting up ${label} integration: ${errorMessage(error)}`);
  }
}

/**
 * Test doubles shared by unit and integration tests
 */

import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import type { ConnectorClient, ExecuteOptions, RawActionSummary } from '../src/connector/index.js';
import type { CompletionClient } from '../src/generator/index.js';
import type { Logger, LogLevel } from '../src/logger/index.js';
import type { ChannelName } from '../src/types/index.js';

// ============================================================================
// Logger
// ============================================================================

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  meta?: Record<string, unknown> | undefined;
}

export interface RecordingLogger extends Logger {
  logs: LogEntry[];
}

export function createRecordingLogger(module = 'test', logs: LogEntry[] = []): RecordingLogger {
  const record =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      logs.push({ level, module, message, meta });
    };

  return {
    logs,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (name: string) => createRecordingLogger(`${module}:${name}`, logs),
  };
}

// ============================================================================
// Connector platform
// ============================================================================

export interface ExecutedAction {
  action: string;
  args: Record<string, unknown>;
  options: ExecuteOptions;
}

export class FakeConnector implements ConnectorClient {
  readonly executed: ExecutedAction[] = [];
  readonly initiated: Array<{ toolkit: ChannelName; entityId: string; params?: Record<string, string> | undefined }> = [];
  readonly polled: string[] = [];

  /** Result (or thrown error) per action name; unlisted actions succeed */
  actionResults = new Map<string, unknown>();
  connectionResponse: unknown = { id: 'ca_test', redirect_url: 'https://connect.example.com/auth/ca_test' };
  accountResponse: unknown = { id: 'ca_test', status: 'ACTIVE' };
  actions: RawActionSummary[] = [];
  listError: Error | undefined;

  async initiateConnection(
    toolkit: ChannelName,
    entityId: string,
    params?: Record<string, string>
  ): Promise<unknown> {
    this.initiated.push({ toolkit, entityId, params });
    if (this.connectionResponse instanceof Error) throw this.connectionResponse;
    return this.connectionResponse;
  }

  async getConnectedAccount(id: string): Promise<unknown> {
    this.polled.push(id);
    return this.accountResponse;
  }

  async executeAction(action: string, args: Record<string, unknown>, options: ExecuteOptions): Promise<unknown> {
    this.executed.push({ action, args, options });
    const result = this.actionResults.has(action)
      ? this.actionResults.get(action)
      : { successful: true, data: { ok: true } };
    if (result instanceof Error) throw result;
    return result;
  }

  async listActions(): Promise<RawActionSummary[]> {
    if (this.listError) throw this.listError;
    return this.actions;
  }
}

// ============================================================================
// LLM
// ============================================================================

export class FakeCompletionClient implements CompletionClient {
  readonly prompts: string[] = [];
  models = ['claude-test-model'];
  modelsError: Error | undefined;

  constructor(private readonly respond: (prompt: string) => string = () => 'Generated text') {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }

  async listModels(): Promise<string[]> {
    if (this.modelsError) throw this.modelsError;
    return this.models;
  }
}

// ============================================================================
// HTTP
// ============================================================================

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * Point an axios instance at an in-process handler instead of the network
 */
export function stubHttp(
  http: AxiosInstance,
  handler: (config: InternalAxiosRequestConfig) => StubReply
): InternalAxiosRequestConfig[] {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const { status, data } = handler(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };

    const validateStatus = config.validateStatus;
    if (validateStatus && !validateStatus(status)) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };

  http.defaults.adapter = adapter;
  return requests;
}

export function createStubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const http = axios.create({ baseURL: 'https://connector.test' });
  const requests = stubHttp(http, handler);
  return { http, requests };
}

export function requestBody(config: InternalAxiosRequestConfig | undefined): unknown {
  if (!config || typeof config.data !== 'string') return undefined;
  return JSON.parse(config.data);
}

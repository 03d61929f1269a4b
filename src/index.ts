/**
 * Outreach Messaging Service - Public Exports
 *
 * Generates outbound messages with an LLM and delivers them through a
 * connector platform (Gmail, Slack, WhatsApp, LinkedIn).
 *
 * Module boundaries:
 * - generator and connector are the only modules that talk to third parties
 *   (plus Slack's Web API for channel listing and health)
 * - delivery services return ServiceResult and never throw for upstream failures
 * - only the api module turns failures into HTTP status codes
 */

// Core Types
export {
  CHANNEL_LABELS,
  DEFAULT_ENTITY_ID,
  failure,
  errorMessage,
  type ChannelName,
  type EntityId,
  type Tone,
  type Personalization,
  type MessageKind,
  type GenerationRequest,
  type SuccessResult,
  type FailureResult,
  type ServiceResult,
  type SetupResult,
  type GeneratedText,
} from './types/index.js';

// Logging
export {
  createLogger,
  silentLogger,
  noopMetrics,
  isLogLevel,
  type Logger,
  type LogLevel,
  type Metrics,
} from './logger/index.js';

// Settings
export {
  loadSettings,
  loadChannelDirectory,
  parseChannelDirectory,
  ConfigError,
  PROJECT_NAME,
  type Settings,
  type ChannelDirectory,
  type ChannelDirectoryEntry,
} from './config/index.js';

// Credential Cache
export {
  CredentialCache,
  MemoryCredentialStore,
  isPlaceholderSecret,
  DEFAULT_CREDENTIAL_TTL_MS,
  type CredentialStore,
  type CredentialCacheOptions,
  type Clock,
} from './credential-cache/index.js';

// Validation
export { validatePhoneNumber, validateRequest } from './validator/index.js';

// Message Generator
export {
  MessageGenerator,
  AnthropicCompletionClient,
  buildPrompt,
  cleanSubject,
  DEFAULT_EMAIL_SUBJECT,
  type CompletionClient,
  type AnthropicClientConfig,
} from './generator/index.js';

// Connector Platform
export {
  ComposioConnectorClient,
  normalizeActionResponse,
  normalizeConnectionResponse,
  executeWithFallback,
  setupConnection,
  ActionFallbackError,
  ConnectorRequestError,
  type ConnectorClient,
  type ConnectorConfig,
  type ExecuteOptions,
} from './connector/index.js';

// Delivery Services
export { GmailService, type EmailDelivery } from './gmail/index.js';
export { SlackService, classifySlackError, type SlackChannel, type SlackDelivery } from './slack/index.js';
export { WhatsAppService, type WhatsAppMessage, type WhatsAppDelivery } from './whatsapp/index.js';
export { LinkedInService, parseProfiles, type LinkedInProfile, type LinkedInAction } from './linkedin/index.js';

// HTTP API
export { createApp, type ApiDependencies } from './api/index.js';
export { buildDependencies } from './bootstrap.js';

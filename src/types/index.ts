/**
 * Core type definitions for the outreach messaging service
 *
 * This module exports the shared shapes every service and route agrees on.
 */

// ============================================================================
// Channels and identities
// ============================================================================

/**
 * Channel integrations brokered by the connector platform
 */
export type ChannelName = 'gmail' | 'slack' | 'whatsapp' | 'linkedin';

/**
 * Display names used in user-facing messages
 */
export const CHANNEL_LABELS: Readonly<Record<ChannelName, string>> = {
  gmail: 'Gmail',
  slack: 'Slack',
  whatsapp: 'WhatsApp',
  linkedin: 'LinkedIn',
};

/**
 * Caller-chosen identifier partitioning which linked account an action applies to
 */
export type EntityId = string;

export const DEFAULT_ENTITY_ID: EntityId = 'default';

// ============================================================================
// Generation
// ============================================================================

export type Tone = 'formal' | 'informal';

/**
 * Optional personalization embedded in generated email bodies
 */
export interface Personalization {
  recipientName?: string | undefined;
  senderName?: string | undefined;
  senderDesignation?: string | undefined;
}

/**
 * Kinds of text the message generator knows how to draft
 */
export type MessageKind =
  | 'email'
  | 'slack'
  | 'whatsapp'
  | 'linkedin_message'
  | 'linkedin_post'
  | 'linkedin_connection_note';

export interface GenerationRequest extends Personalization {
  prompt: string;
  tone?: Tone | undefined;
}

// ============================================================================
// Normalized results
// ============================================================================

export interface SuccessResult {
  success: true;
  message: string;
}

export interface FailureResult {
  success: false;
  error: string;
}

/**
 * Uniform result contract returned by every internal operation,
 * whatever shape the upstream provider answered with.
 */
export type ServiceResult<T extends object = Record<never, never>> = (SuccessResult & T) | FailureResult;

/**
 * Result of a connection setup request
 */
export type SetupResult = ServiceResult<{ redirectUrl?: string | undefined }>;

/**
 * Text produced by the generator
 */
export type GeneratedText = ServiceResult<{ content: string }>;

/**
 * Helper for building failure results
 */
export function failure(error: string): FailureResult {
  return { success: false, error };
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

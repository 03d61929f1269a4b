/**
 * Validator Module
 *
 * Request schemas for every HTTP operation, plus the channel-specific input
 * rules shared by routes and services:
 * - placeholder credentials are rejected
 * - messaging-app phone numbers are reduced to digits and must keep at least 10
 */

import { z } from 'zod';
import { isPlaceholderSecret } from '../credential-cache/index.js';
import { DEFAULT_ENTITY_ID, failure, type ServiceResult } from '../types/index.js';

// ============================================================================
// Phone numbers
// ============================================================================

export const MIN_PHONE_DIGITS = 10;

/**
 * Normalize a messaging-app phone number
 *
 * Strips every non-digit character; the connector platform expects
 * numbers without a leading "+".
 */
export function validatePhoneNumber(
  phoneNumber: string | null | undefined
): ServiceResult<{ normalized: string }> {
  if (!phoneNumber || !phoneNumber.trim()) {
    return failure('Phone number cannot be empty');
  }

  const normalized = phoneNumber.replace(/\D/g, '');
  if (normalized.length < MIN_PHONE_DIGITS) {
    return failure(
      `Phone number ${phoneNumber} is too short. It should include country code and at least ${MIN_PHONE_DIGITS} digits.`
    );
  }

  return { success: true, message: 'Phone number is valid', normalized };
}

// ============================================================================
// Schema helpers
// ============================================================================

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`);

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : undefined));

/**
 * A credential the caller must supply; empty and placeholder values are rejected
 */
const credential = (message: string) =>
  z
    .string()
    .nullish()
    .refine((value) => !isPlaceholderSecret(value), message)
    .transform((value) => (value ?? '').trim());

const entityId = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : DEFAULT_ENTITY_ID));

const personalization = {
  recipient_name: optionalText,
  sender_name: optionalText,
  sender_designation: optionalText,
};

// ============================================================================
// Setup
// ============================================================================

export const SetupRequestSchema = z.object({
  entity_id: entityId,
});

export const AuthConnectRequestSchema = z.object({
  entity_id: requiredText('entity_id'),
});

export const WHATSAPP_SETUP_REQUIRED =
  'Both auth_token and phone_number_id are required for WhatsApp integration';

export const WhatsAppSetupRequestSchema = z.object({
  auth_token: credential(WHATSAPP_SETUP_REQUIRED),
  phone_number_id: credential(WHATSAPP_SETUP_REQUIRED),
  entity_id: entityId,
});

// ============================================================================
// Gmail
// ============================================================================

export const EmailGenerateRequestSchema = z.object({
  content_prompt: requiredText('content_prompt'),
  is_formal: z.boolean().default(true),
  ...personalization,
});

export const EmailSendRequestSchema = z.object({
  recipient_email: z
    .string({ required_error: 'recipient_email is required' })
    .trim()
    .email('recipient_email must be a valid email address'),
  content_prompt: requiredText('content_prompt'),
  is_formal: z.boolean().default(true),
  ...personalization,
  entity_id: entityId,
});

// ============================================================================
// Slack
// ============================================================================

export const SLACK_TOKEN_REQUIRED = 'A valid Slack bot token must be provided';

export const SlackChannelsQuerySchema = z.object({
  bot_token: credential(SLACK_TOKEN_REQUIRED),
});

export const SlackMessageRequestSchema = z.object({
  content_prompt: requiredText('content_prompt'),
  channel_id: requiredText('channel_id'),
  channel_name: optionalText,
  bot_token: optionalText,
  entity_id: entityId,
});

// ============================================================================
// WhatsApp
// ============================================================================

export const WhatsAppGenerateRequestSchema = z.object({
  content_prompt: requiredText('content_prompt'),
  phone_number: optionalText,
});

const whatsappDelivery = {
  phone_number: requiredText('phone_number'),
  api_key: optionalText,
  entity_id: entityId,
};

export const WhatsAppSendRequestSchema = z.object({
  content_prompt: requiredText('content_prompt'),
  ...whatsappDelivery,
});

export const WhatsAppMediaRequestSchema = z.object({
  media_url: z.string({ required_error: 'media_url is required' }).trim().url('media_url must be a valid URL'),
  caption: z.string().default(''),
  ...whatsappDelivery,
});

export const WhatsAppTemplateRequestSchema = z.object({
  template_name: requiredText('template_name'),
  template_params: z
    .record(z.union([z.string(), z.number()]).transform(String))
    .refine((params) => Object.keys(params).length > 0, 'template_params must not be empty'),
  ...whatsappDelivery,
});

// ============================================================================
// LinkedIn
// ============================================================================

export const LINKEDIN_TOKEN_REQUIRED = 'A valid LinkedIn access token must be provided';

const linkedinToken = credential(LINKEDIN_TOKEN_REQUIRED);

export const LinkedInSearchRequestSchema = z.object({
  keywords: requiredText('keywords'),
  access_token: linkedinToken,
  limit: z.number().int().min(1).max(100).default(10),
  entity_id: entityId,
});

export const LinkedInConnectRequestSchema = z.object({
  profile_url: z.string({ required_error: 'profile_url is required' }).trim().url('profile_url must be a valid URL'),
  message: optionalText,
  access_token: linkedinToken,
  entity_id: entityId,
});

export const LinkedInMessageRequestSchema = z.object({
  profile_id: requiredText('profile_id'),
  content_prompt: requiredText('content_prompt'),
  access_token: linkedinToken,
  entity_id: entityId,
});

export const LinkedInPostRequestSchema = z.object({
  content_prompt: requiredText('content_prompt'),
  access_token: linkedinToken,
  image_url: z.string().trim().url('image_url must be a valid URL').nullish(),
  article_url: z.string().trim().url('article_url must be a valid URL').nullish(),
  entity_id: entityId,
});

// ============================================================================
// Generic validation
// ============================================================================

/**
 * Validate unknown input against a schema, reporting the first issue
 */
export function validateRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ServiceResult<{ data: z.output<S> }> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, message: 'Request is valid', data: result.data };
  }

  const [first] = result.error.errors;
  if (!first) {
    return failure('Invalid request');
  }
  // Refinement messages already name the problem; type errors need the field
  const field = first.path.join('.');
  const message =
    first.code === 'custom' || !field || first.message.startsWith(field)
      ? first.message
      : `${field}: ${first.message}`;
  return failure(message);
}

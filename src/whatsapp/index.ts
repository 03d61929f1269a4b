/**
 * WhatsApp Delivery Service
 *
 * Sends text, media and template messages through the connector platform.
 *
 * Text and media messages are delivered only inside the 24-hour customer
 * service window opened by the recipient; template messages can reach any
 * opted-in user outside it.
 */

import type { ConnectorClient } from '../connector/index.js';
import { normalizeActionResponse, setupConnection } from '../connector/index.js';
import { CredentialCache } from '../credential-cache/index.js';
import type { Logger } from '../logger/index.js';
import { silentLogger } from '../logger/index.js';
import type { EntityId, ServiceResult, SetupResult } from '../types/index.js';
import { CHANNEL_LABELS, DEFAULT_ENTITY_ID, errorMessage, failure } from '../types/index.js';
import { validatePhoneNumber } from '../validator/index.js';

// ============================================================================
// Types
// ============================================================================

export type WhatsAppMessage =
  | { kind: 'text'; text: string }
  | { kind: 'media'; mediaUrl: string; caption?: string | undefined }
  | { kind: 'template'; templateName: string; templateParams: Record<string, string> };

export interface WhatsAppDelivery {
  phoneNumber: string;
  message: WhatsAppMessage;
  apiKey?: string | undefined;
  entityId?: EntityId | undefined;
}

export interface WhatsAppSetupRequest {
  authToken: string;
  phoneNumberId: string;
  entityId?: EntityId | undefined;
}

export interface WhatsAppServiceOptions {
  credentials?: CredentialCache;
  logger?: Logger;
}

export const WHATSAPP_ACTIONS = {
  text: 'WHATSAPP_SEND_MESSAGE',
  media: 'WHATSAPP_SEND_MEDIA',
  template: 'WHATSAPP_SEND_TEMPLATE_MESSAGE',
} as const satisfies Record<WhatsAppMessage['kind'], string>;

const SENT_LABELS: Record<WhatsAppMessage['kind'], string> = {
  text: 'Message',
  media: 'Media',
  template: 'Template message',
};

// ============================================================================
// Service
// ============================================================================

export class WhatsAppService {
  private readonly credentials: CredentialCache;
  private readonly logger: Logger;

  constructor(private readonly connector: ConnectorClient, options: WhatsAppServiceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.credentials = options.credentials ?? new CredentialCache({ kind: 'API key', logger: this.logger });
  }

  /**
   * Create an API-key style connection from business account credentials
   */
  setup(request: WhatsAppSetupRequest): Promise<SetupResult> {
    return setupConnection(
      this.connector,
      'whatsapp',
      request.entityId ?? DEFAULT_ENTITY_ID,
      { auth_token: request.authToken, phone_number_id: request.phoneNumberId },
      CHANNEL_LABELS.whatsapp,
      this.logger
    );
  }

  async send(delivery: WhatsAppDelivery): Promise<ServiceResult<{ phoneNumber: string }>> {
    const phone = validatePhoneNumber(delivery.phoneNumber);
    if (!phone.success) {
      return phone;
    }
    const toNumber = phone.normalized;
    const { message } = delivery;

    let args: Record<string, unknown>;
    switch (message.kind) {
      case 'text':
        args = { to_number: toNumber, text: message.text };
        break;
      case 'media':
        if (!message.mediaUrl.trim()) {
          return failure('Media URL is required for media messages');
        }
        args = { to_number: toNumber, media_url: message.mediaUrl, caption: message.caption ?? '' };
        break;
      case 'template':
        if (!message.templateName.trim() || Object.keys(message.templateParams).length === 0) {
          return failure('Template name and parameters are required for template messages');
        }
        args = {
          to_number: toNumber,
          template_name: message.templateName,
          template_params: message.templateParams,
        };
        break;
    }

    const apiKey = this.credentials.resolve(toNumber, delivery.apiKey);

    if (message.kind === 'template') {
      this.logger.info('Sending WhatsApp template message; usable outside the 24-hour window', {
        to: toNumber,
        template: message.templateName,
      });
    } else {
      this.logger.info(
        `Sending WhatsApp ${message.kind}; delivered only within 24 hours of the recipient's last message`,
        { to: toNumber }
      );
    }
    this.logger.debug('WhatsApp API key', { to: toNumber, available: apiKey !== undefined });

    const label = SENT_LABELS[message.kind];
    try {
      const raw = await this.connector.executeAction(WHATSAPP_ACTIONS[message.kind], args, {
        entityId: delivery.entityId ?? DEFAULT_ENTITY_ID,
      });

      const result = normalizeActionResponse(raw);
      if (!result.success) {
        this.logger.warn('WhatsApp send rejected', { to: toNumber, kind: message.kind, error: result.error });
        return failure(`Failed to send ${label.toLowerCase()} via connector platform: ${result.error}`);
      }

      return {
        success: true,
        message: `${label} successfully sent to ${delivery.phoneNumber}`,
        phoneNumber: toNumber,
      };
    } catch (error) {
      this.logger.error('Error using connector platform for WhatsApp', { error: errorMessage(error) });
      return failure(`Error using connector platform for WhatsApp: ${errorMessage(error)}`);
    }
  }
}

/**
 * Gmail Delivery Service
 *
 * Links a mailbox through the connector platform and sends generated
 * emails with the GMAIL_SEND_EMAIL action.
 */

import type { ConnectorClient } from '../connector/index.js';
import { normalizeActionResponse, setupConnection } from '../connector/index.js';
import type { Logger } from '../logger/index.js';
import { silentLogger } from '../logger/index.js';
import type { EntityId, ServiceResult, SetupResult } from '../types/index.js';
import { CHANNEL_LABELS, DEFAULT_ENTITY_ID, errorMessage, failure } from '../types/index.js';

export const GMAIL_SEND_ACTION = 'GMAIL_SEND_EMAIL';

export interface EmailDelivery {
  recipientEmail: string;
  subject: string;
  body: string;
  entityId?: EntityId | undefined;
}

export interface GmailServiceOptions {
  logger?: Logger;
}

export class GmailService {
  private readonly logger: Logger;

  constructor(private readonly connector: ConnectorClient, options: GmailServiceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start (or restart) mailbox linking for an entity
   */
  setup(entityId: EntityId = DEFAULT_ENTITY_ID): Promise<SetupResult> {
    return setupConnection(this.connector, 'gmail', entityId, undefined, CHANNEL_LABELS.gmail, this.logger);
  }

  async send(delivery: EmailDelivery): Promise<ServiceResult> {
    const entityId = delivery.entityId ?? DEFAULT_ENTITY_ID;

    try {
      const raw = await this.connector.executeAction(
        GMAIL_SEND_ACTION,
        {
          recipient_email: delivery.recipientEmail,
          subject: delivery.subject,
          body: delivery.body,
        },
        { entityId }
      );

      const result = normalizeActionResponse(raw);
      if (!result.success) {
        this.logger.warn('Gmail send rejected', { recipient: delivery.recipientEmail, error: result.error });
        return failure(`Failed to send email: ${result.error}`);
      }

      this.logger.info('Email sent', { recipient: delivery.recipientEmail, entityId });
      return { success: true, message: `Email successfully sent to ${delivery.recipientEmail}` };
    } catch (error) {
      this.logger.error('Error using connector platform for Gmail', { error: errorMessage(error) });
      return failure(`Error using connector platform for Gmail: ${errorMessage(error)}`);
    }
  }
}

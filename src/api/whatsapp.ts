/**
 * WhatsApp routes
 *
 * Phone numbers are validated before any LLM or connector call, so a
 * malformed number costs nothing and answers 400.
 */

import { Hono } from 'hono';
import { CHANNEL_LABELS } from '../types/index.js';
import {
  WhatsAppGenerateRequestSchema,
  WhatsAppMediaRequestSchema,
  WhatsAppSendRequestSchema,
  WhatsAppSetupRequestSchema,
  WhatsAppTemplateRequestSchema,
} from '../validator/index.js';
import type { ApiDependencies } from './index.js';
import { parseBody, requirePhoneNumber, setupFailed } from './request.js';

export function whatsappRoutes({ generator, whatsapp }: ApiDependencies): Hono {
  const routes = new Hono();

  routes.post('/setup', async (c) => {
    const body = await parseBody(c, WhatsAppSetupRequestSchema);
    const result = await whatsapp.setup({
      authToken: body.auth_token,
      phoneNumberId: body.phone_number_id,
      entityId: body.entity_id,
    });
    if (!result.success) setupFailed(CHANNEL_LABELS.whatsapp, result);
    return c.json({ success: true, message: result.message, redirect_url: result.redirectUrl });
  });

  routes.post('/generate', async (c) => {
    const body = await parseBody(c, WhatsAppGenerateRequestSchema);
    const phoneNumber = body.phone_number ? requirePhoneNumber(body.phone_number) : undefined;

    const draft = await generator.generate('whatsapp', { prompt: body.content_prompt });
    if (!draft.success) {
      return c.json({ success: false, message: 'Failed to generate message', phone_number: phoneNumber, error: draft.error });
    }
    return c.json({
      success: true,
      message: 'Message generated successfully',
      phone_number: phoneNumber,
      message_content: draft.content,
    });
  });

  routes.post('/send', async (c) => {
    const body = await parseBody(c, WhatsAppSendRequestSchema);
    const phoneNumber = requirePhoneNumber(body.phone_number);

    const draft = await generator.generate('whatsapp', { prompt: body.content_prompt });
    if (!draft.success) {
      return c.json({ success: false, message: 'Failed to generate message', phone_number: phoneNumber, error: draft.error });
    }

    const sent = await whatsapp.send({
      phoneNumber,
      message: { kind: 'text', text: draft.content },
      apiKey: body.api_key,
      entityId: body.entity_id,
    });

    if (!sent.success) {
      return c.json({
        success: false,
        message: 'Failed to send message',
        phone_number: phoneNumber,
        message_content: draft.content,
        error: sent.error,
      });
    }
    return c.json({
      success: true,
      message: `Message sent successfully to ${phoneNumber}`,
      phone_number: phoneNumber,
      message_content: draft.content,
    });
  });

  routes.post('/send-media', async (c) => {
    const body = await parseBody(c, WhatsAppMediaRequestSchema);
    const phoneNumber = requirePhoneNumber(body.phone_number);

    const sent = await whatsapp.send({
      phoneNumber,
      message: { kind: 'media', mediaUrl: body.media_url, caption: body.caption },
      apiKey: body.api_key,
      entityId: body.entity_id,
    });

    if (!sent.success) {
      return c.json({ success: false, message: 'Failed to send media', phone_number: phoneNumber, error: sent.error });
    }
    return c.json({ success: true, message: `Media sent successfully to ${phoneNumber}`, phone_number: phoneNumber });
  });

  routes.post('/send-template', async (c) => {
    const body = await parseBody(c, WhatsAppTemplateRequestSchema);
    const phoneNumber = requirePhoneNumber(body.phone_number);

    const sent = await whatsapp.send({
      phoneNumber,
      message: { kind: 'template', templateName: body.template_name, templateParams: body.template_params },
      apiKey: body.api_key,
      entityId: body.entity_id,
    });

    if (!sent.success) {
      return c.json({ success: false, message: 'Failed to send template', phone_number: phoneNumber, error: sent.error });
    }
    return c.json({ success: true, message: `Template sent successfully to ${phoneNumber}`, phone_number: phoneNumber });
  });

  return routes;
}

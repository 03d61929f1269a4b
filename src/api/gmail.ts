/**
 * Gmail routes: setup, generate, generate-and-send, and the auth alias
 */

import { Hono } from 'hono';
import { DEFAULT_EMAIL_SUBJECT } from '../generator/index.js';
import type { GenerationRequest } from '../types/index.js';
import { CHANNEL_LABELS } from '../types/index.js';
import {
  AuthConnectRequestSchema,
  EmailGenerateRequestSchema,
  EmailSendRequestSchema,
  SetupRequestSchema,
} from '../validator/index.js';
import type { ApiDependencies } from './index.js';
import { parseBody, setupFailed } from './request.js';

interface EmailFields {
  content_prompt: string;
  is_formal: boolean;
  recipient_name?: string | undefined;
  sender_name?: string | undefined;
  sender_designation?: string | undefined;
}

function toGenerationRequest(body: EmailFields): GenerationRequest {
  return {
    prompt: body.content_prompt,
    tone: body.is_formal ? 'formal' : 'informal',
    recipientName: body.recipient_name,
    senderName: body.sender_name,
    senderDesignation: body.sender_designation,
  };
}

async function runSetup({ gmail }: ApiDependencies, entityId: string) {
  const result = await gmail.setup(entityId);
  if (!result.success) setupFailed(CHANNEL_LABELS.gmail, result);
  return { success: true, message: result.message, redirect_url: result.redirectUrl };
}

export function gmailRoutes(deps: ApiDependencies): Hono {
  const { generator, gmail } = deps;
  const routes = new Hono();

  routes.post('/setup', async (c) => {
    const body = await parseBody(c, SetupRequestSchema);
    return c.json(await runSetup(deps, body.entity_id));
  });

  routes.post('/generate', async (c) => {
    const body = await parseBody(c, EmailGenerateRequestSchema);
    const email = await generator.generate('email', toGenerationRequest(body));

    if (!email.success) {
      return c.json({ success: false, message: 'Failed to generate email', error: email.error });
    }
    return c.json({ success: true, message: 'Email generated successfully', email_content: email.content });
  });

  routes.post('/send', async (c) => {
    const body = await parseBody(c, EmailSendRequestSchema);

    const email = await generator.generate('email', toGenerationRequest(body));
    if (!email.success) {
      return c.json({ success: false, message: 'Failed to generate email', error: email.error });
    }

    const subjectResult = await generator.generateSubject(body.content_prompt);
    const subject = subjectResult.success ? subjectResult.content : DEFAULT_EMAIL_SUBJECT;

    const sent = await gmail.send({
      recipientEmail: body.recipient_email,
      subject,
      body: email.content,
      entityId: body.entity_id,
    });

    if (!sent.success) {
      return c.json({
        success: false,
        message: 'Failed to send email',
        subject,
        email_content: email.content,
        error: sent.error,
      });
    }
    return c.json({ success: true, message: sent.message, subject, email_content: email.content });
  });

  return routes;
}

/**
 * Account-linking alias under /auth
 */
export function authRoutes(deps: ApiDependencies): Hono {
  const routes = new Hono();

  routes.post('/gmail/connect', async (c) => {
    const body = await parseBody(c, AuthConnectRequestSchema);
    return c.json(await runSetup(deps, body.entity_id));
  });

  return routes;
}

/**
 * LinkedIn routes
 *
 * Every response is `{ success, message, data?, error? }` with status 200;
 * only validation problems (including placeholder access tokens) answer 400.
 */

import { Hono } from 'hono';
import {
  LinkedInConnectRequestSchema,
  LinkedInMessageRequestSchema,
  LinkedInPostRequestSchema,
  LinkedInSearchRequestSchema,
  SetupRequestSchema,
} from '../validator/index.js';
import type { ApiDependencies } from './index.js';
import { parseBody } from './request.js';

export const CONNECTION_NOTE_PROMPT =
  'Write a brief, professional LinkedIn connection request message that is concise and friendly.';

export function linkedinRoutes({ generator, linkedin, logger }: ApiDependencies): Hono {
  const routes = new Hono();

  routes.post('/setup', async (c) => {
    const body = await parseBody(c, SetupRequestSchema);
    const result = await linkedin.setup(body.entity_id);

    if (!result.success) {
      return c.json({ success: false, message: 'Failed to setup LinkedIn integration', error: result.error });
    }
    return c.json({
      success: true,
      message: result.message,
      data: result.redirectUrl ? { redirect_url: result.redirectUrl } : undefined,
    });
  });

  routes.post('/search-profiles', async (c) => {
    const body = await parseBody(c, LinkedInSearchRequestSchema);
    const result = await linkedin.searchProfiles({
      keywords: body.keywords,
      limit: body.limit,
      accessToken: body.access_token,
      entityId: body.entity_id,
    });

    if (!result.success) {
      return c.json({ success: false, message: 'Failed to search profiles', profiles: [], error: result.error });
    }
    return c.json({ success: true, message: result.message, profiles: result.profiles });
  });

  routes.post('/connect', async (c) => {
    const body = await parseBody(c, LinkedInConnectRequestSchema);

    let note = body.message;
    if (!note) {
      const draft = await generator.generate('linkedin_connection_note', { prompt: CONNECTION_NOTE_PROMPT });
      if (draft.success) {
        note = draft.content;
      } else {
        logger.warn('Falling back to default connection note', { error: draft.error });
      }
    }

    const result = await linkedin.sendConnectionRequest({
      profileUrl: body.profile_url,
      message: note,
      accessToken: body.access_token,
      entityId: body.entity_id,
    });

    if (!result.success) {
      return c.json({ success: false, message: 'Failed to send connection request', error: result.error });
    }
    return c.json({
      success: true,
      message: result.message,
      data: { profile_url: body.profile_url, message: result.note },
    });
  });

  routes.post('/message', async (c) => {
    const body = await parseBody(c, LinkedInMessageRequestSchema);

    const draft = await generator.generate('linkedin_message', { prompt: body.content_prompt });
    if (!draft.success) {
      return c.json({ success: false, message: 'Failed to generate message', error: draft.error });
    }

    const result = await linkedin.sendMessage({
      profileId: body.profile_id,
      message: draft.content,
      accessToken: body.access_token,
      entityId: body.entity_id,
    });

    if (!result.success) {
      return c.json({
        success: false,
        message: 'Failed to send message',
        data: { message_content: draft.content },
        error: result.error,
      });
    }
    return c.json({
      success: true,
      message: result.message,
      data: { profile_id: body.profile_id, message_content: draft.content },
    });
  });

  routes.post('/post', async (c) => {
    const body = await parseBody(c, LinkedInPostRequestSchema);

    const draft = await generator.generate('linkedin_post', { prompt: body.content_prompt });
    if (!draft.success) {
      return c.json({ success: false, message: 'Failed to generate post', error: draft.error });
    }

    const result = await linkedin.createPost({
      content: draft.content,
      accessToken: body.access_token,
      imageUrl: body.image_url ?? undefined,
      articleUrl: body.article_url ?? undefined,
      entityId: body.entity_id,
    });

    if (!result.success) {
      return c.json({
        success: false,
        message: 'Failed to create post',
        data: { content: draft.content },
        error: result.error,
      });
    }
    return c.json({
      success: true,
      message: result.message,
      data: { post_id: result.postId, content: draft.content },
    });
  });

  routes.get('/actions', async (c) => {
    const result = await linkedin.listActions();
    if (!result.success) {
      return c.json({ success: false, message: 'Failed to list LinkedIn actions', actions: [], error: result.error });
    }
    return c.json({ success: true, message: result.message, actions: result.actions });
  });

  return routes;
}

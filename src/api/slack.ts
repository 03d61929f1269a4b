/**
 * Slack routes
 */

import { Hono, type Context } from 'hono';
import { CHANNEL_LABELS } from '../types/index.js';
import { SetupRequestSchema, SlackChannelsQuerySchema, SlackMessageRequestSchema } from '../validator/index.js';
import type { ApiDependencies } from './index.js';
import { parseBody, parseInput, setupFailed } from './request.js';

export function slackRoutes({ generator, slack }: ApiDependencies): Hono {
  const routes = new Hono();

  routes.post('/setup', async (c) => {
    const body = await parseBody(c, SetupRequestSchema);
    const result = await slack.setup(body.entity_id);
    if (!result.success) setupFailed(CHANNEL_LABELS.slack, result);
    return c.json({ success: true, message: result.message, redirect_url: result.redirectUrl });
  });

  const listChannels = async (c: Context) => {
    const query = parseInput(SlackChannelsQuerySchema, { bot_token: c.req.query('bot_token') });
    return c.json({ channels: await slack.listChannels(query.bot_token) });
  };
  routes.get('/channels', listChannels);
  routes.post('/channels', listChannels);

  routes.post('/generate', async (c) => {
    const body = await parseBody(c, SlackMessageRequestSchema);
    const channel = slack.resolveChannel(body.channel_id);
    const channelName = body.channel_name ?? channel.name ?? channel.id;

    const draft = await generator.generate('slack', { prompt: body.content_prompt });
    if (!draft.success) {
      return c.json({ success: false, message: 'Failed to generate message', channel_name: channelName, error: draft.error });
    }
    return c.json({
      success: true,
      message: 'Message generated successfully',
      channel_name: channelName,
      message_content: draft.content,
    });
  });

  routes.post('/send', async (c) => {
    const body = await parseBody(c, SlackMessageRequestSchema);
    const channel = slack.resolveChannel(body.channel_id);
    const channelName = body.channel_name ?? channel.name ?? channel.id;

    const draft = await generator.generate('slack', { prompt: body.content_prompt });
    if (!draft.success) {
      return c.json({ success: false, message: 'Failed to generate message', channel_name: channelName, error: draft.error });
    }

    const sent = await slack.send({
      channelId: channel.id,
      text: draft.content,
      botToken: body.bot_token,
      channelName,
      entityId: body.entity_id,
    });

    if (!sent.success) {
      return c.json({
        success: false,
        message: 'Failed to send message',
        channel_name: channelName,
        message_content: draft.content,
        error: sent.error,
      });
    }
    return c.json({
      success: true,
      message: `Message sent successfully to #${channelName}`,
      channel_name: channelName,
      message_content: draft.content,
    });
  });

  return routes;
}

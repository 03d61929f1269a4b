/**
 * HTTP API
 *
 * Hono application exposing generate / send / setup operations for every
 * channel under the configured prefix, plus health checks.
 *
 * Error mapping:
 * - HTTPException (validation, setup failures) -> its status, `{ detail }`
 * - anything else -> 500 `{ detail: "Internal server error" }`, logged with stack
 *
 * Generate and send failures are not errors here: they answer 200 with
 * `success: false` and whatever content was already produced.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import type { Settings } from '../config/index.js';
import type { MessageGenerator } from '../generator/index.js';
import type { GmailService } from '../gmail/index.js';
import type { LinkedInService } from '../linkedin/index.js';
import type { Logger } from '../logger/index.js';
import type { SlackService } from '../slack/index.js';
import type { WhatsAppService } from '../whatsapp/index.js';
import { authRoutes, gmailRoutes } from './gmail.js';
import { healthRoutes } from './health.js';
import { linkedinRoutes } from './linkedin.js';
import { slackRoutes } from './slack.js';
import { whatsappRoutes } from './whatsapp.js';

export interface ApiDependencies {
  settings: Pick<Settings, 'projectName' | 'apiPrefix'>;
  generator: MessageGenerator;
  gmail: GmailService;
  slack: SlackService;
  whatsapp: WhatsAppService;
  linkedin: LinkedInService;
  logger: Logger;
}

export function createApp(deps: ApiDependencies): Hono {
  const { settings, logger } = deps;
  const prefix = settings.apiPrefix;
  const app = new Hono();

  app.use('*', cors());

  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    logger.info('Request completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ detail: err.message }, err.status);
    }
    logger.error('Unhandled request error', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: err.stack,
    });
    return c.json({ detail: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));

  app.get('/', (c) =>
    c.json({
      name: settings.projectName,
      message: `Welcome to the ${settings.projectName} API`,
      health: `${prefix}/health`,
    })
  );
  app.get('/health', (c) => c.json({ status: 'healthy' }));

  app.route(`${prefix}/gmail`, gmailRoutes(deps));
  app.route(`${prefix}/auth`, authRoutes(deps));
  app.route(`${prefix}/slack`, slackRoutes(deps));
  app.route(`${prefix}/whatsapp`, whatsappRoutes(deps));
  app.route(`${prefix}/linkedin`, linkedinRoutes(deps));
  app.route(`${prefix}/health`, healthRoutes(deps));

  return app;
}

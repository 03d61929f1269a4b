/**
 * Health routes
 *
 * The detailed check calls the LLM provider and checks the Slack bot token. The
 * service is "healthy" while the LLM answers; Slack only affects its entry.
 */

import { Hono } from 'hono';
import type { ServiceResult } from '../types/index.js';
import type { ApiDependencies } from './index.js';

function connectionStatus(result: ServiceResult) {
  return result.success
    ? { status: 'connected', details: result.message }
    : { status: 'disconnected', details: result.error };
}

export function healthRoutes({ settings, generator, slack }: ApiDependencies): Hono {
  const routes = new Hono();

  routes.get('/', (c) => c.json({ status: 'healthy', service: settings.projectName }));

  routes.get('/detailed', async (c) => {
    const [llm, slackStatus] = await Promise.all([generator.checkConnection(), slack.checkConnection()]);

    return c.json({
      status: llm.success ? 'healthy' : 'degraded',
      service: settings.projectName,
      system_info: {
        node_version: process.version,
        platform: process.platform,
        uptime_seconds: Math.floor(process.uptime()),
      },
      api_connections: {
        llm: connectionStatus(llm),
        slack: connectionStatus(slackStatus),
      },
    });
  });

  return routes;
}

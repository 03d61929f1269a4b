/**
 * Wires settings into the concrete clients and services the API needs
 */

import type { ApiDependencies } from './api/index.js';
import type { Settings } from './config/index.js';
import { ComposioConnectorClient } from './connector/index.js';
import { AnthropicCompletionClient, MessageGenerator } from './generator/index.js';
import { GmailService } from './gmail/index.js';
import { LinkedInService } from './linkedin/index.js';
import type { Logger, Metrics } from './logger/index.js';
import { noopMetrics } from './logger/index.js';
import { SlackService } from './slack/index.js';
import { WhatsAppService } from './whatsapp/index.js';

export function buildDependencies(
  settings: Settings,
  logger: Logger,
  metrics: Metrics = noopMetrics
): ApiDependencies {
  const connector = new ComposioConnectorClient(settings.connector, { logger: logger.child('connector') });
  const completions = new AnthropicCompletionClient(settings.llm, {
    logger: logger.child('llm'),
    metrics,
  });

  if (!settings.slack.botToken) {
    logger.warn('SLACK_BOT_TOKEN is not set; Slack health checks will report disconnected');
  }

  return {
    settings,
    generator: new MessageGenerator(completions, { logger: logger.child('generator'), metrics }),
    gmail: new GmailService(connector, { logger: logger.child('gmail') }),
    slack: new SlackService(connector, {
      directory: settings.slack.channels,
      botToken: settings.slack.botToken,
      logger: logger.child('slack'),
    }),
    whatsapp: new WhatsAppService(connector, { logger: logger.child('whatsapp') }),
    linkedin: new LinkedInService(connector, { logger: logger.child('linkedin') }),
    logger: logger.child('http'),
  };
}

import { request } from 'undici';
import { ALERT_PROVIDERS, resolveAlertProvider } from './providers.js';
import { errorMessage } from '../errors.js';
import type { RunContext } from '../context.js';
import type { Logger } from '../logger.js';
import type { AlertMessage } from '../types/deployment.js';

export interface WebhookResponse {
  statusCode: number;
  body: unknown;
}

export type WebhookTransport = (url: string, payload: unknown) => Promise<WebhookResponse>;

/** POST `payload` as JSON; the body is parsed when it is JSON, else kept as text. */
export const postJson: WebhookTransport = async (url, payload) => {
  const response = await request(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });
  const text = await response.body.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    body = text;
  }
  return { statusCode: response.statusCode, body };
};

export interface AlertDeps {
  logger: Logger;
  transport?: WebhookTransport;
}

export function formatAlert(message: AlertMessage): string {
  return `[${message.source}] ${message.timestamp.toISOString()}\n${message.body}`;
}

/**
 * Best-effort webhook notification. Never rejects: every failure is logged
 * and dropped so it cannot replace the error being reported.
 */
export async function dispatchAlert(targetUrl: string, message: AlertMessage, deps: AlertDeps): Promise<void> {
  const logger = deps.logger.child({ component: 'alerts' });

  try {
    if (targetUrl.trim() === '') {
      logger.debug({ source: message.source }, 'No webhook configured; alert not sent');
      return;
    }

    const tag = resolveAlertProvider(targetUrl);
    if (tag === 'unknown') {
      logger.warn({ source: message.source }, 'Webhook URL matches no known alert provider; alert not sent');
      return;
    }

    const provider = ALERT_PROVIDERS[tag];
    const transport = deps.transport ?? postJson;
    const response = await transport(targetUrl, provider.buildPayload(formatAlert(message)));

    if (provider.isSuccess(response.body)) {
      logger.info({ provider: tag, source: message.source }, 'Alert sent');
    } else {
      logger.warn({ provider: tag, statusCode: response.statusCode, response: response.body }, 'Alert provider rejected the message');
    }
  } catch (err) {
    logger.error({ err: errorMessage(err), source: message.source }, 'Alert dispatch failed');
  }
}

export type Alerter = (body: string) => Promise<void>;

/** Bind the run's source and webhook so callers only supply the text. */
export function createAlerter(run: RunContext, deps: AlertDeps, now: () => Date = () => new Date()): Alerter {
  return (body) => dispatchAlert(run.webhookUrl, { source: run.source, body, timestamp: now() }, deps);
}

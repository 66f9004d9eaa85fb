/**
 * Webhook notification transport (HTTP POST with Basic auth)
 */

import { HttpClient, basicAuth, type HttpResponse } from '../utils/http.js';
import { TransportError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type { WebhookConfig } from '../core/config.js';
import type { NotificationTransport, RenderedReport } from '../core/types.js';

/**
 * Payload accepted by the mail-relay webhook
 */
export interface WebhookPayload {
  subject: string;
  body: string;
  to: string;
  sender: string;
}

const MAX_ERROR_BODY = 200;

export class WebhookNotifier implements NotificationTransport {
  private config: WebhookConfig;
  private client: HttpClient;

  constructor(config: WebhookConfig, client?: HttpClient) {
    this.config = config;
    this.client = client ?? new HttpClient(config.timeoutMs);
  }

  /**
   * Deliver once. Failures surface as TransportError; retrying is the caller's call.
   */
  async send(message: RenderedReport): Promise<void> {
    const payload: WebhookPayload = {
      subject: message.subject,
      body: message.html,
      to: this.config.to,
      sender: this.config.sender,
    };

    let response: HttpResponse;
    try {
      response = await this.client.postJson(this.config.url, payload, {
        headers: { authorization: basicAuth(this.config.username, this.config.password) },
      });
    } catch (error) {
      throw new TransportError(`Webhook delivery failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      const body = response.body.trim().slice(0, MAX_ERROR_BODY);
      throw new TransportError(
        `Webhook responded with ${response.statusCode}${body ? `: ${body}` : ''}`,
        { status: response.statusCode }
      );
    }

    logger.success(`Notification sent to ${this.config.to}`, { status: response.statusCode });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

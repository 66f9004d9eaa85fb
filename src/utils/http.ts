/**
 * HTTP utilities
 */

import { request, Agent, type Dispatcher } from 'undici';

/**
 * Create a small keep-alive agent. Notifications are rare, so the pool stays tiny.
 */
export function createHttpAgent() {
  return new Agent({
    connections: 4,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
  });
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

/**
 * HTTP client with timeout
 */
export class HttpClient {
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private timeout: number;

  constructor(timeout = 10000, dispatcher?: Dispatcher) {
    this.dispatcher = dispatcher ?? createHttpAgent();
    this.ownsDispatcher = dispatcher === undefined;
    this.timeout = timeout;
  }

  /**
   * POST a JSON payload and read the response body as text
   */
  async postJson(
    url: string,
    payload: unknown,
    options: {
      headers?: Record<string, string>;
    } = {}
  ): Promise<HttpResponse> {
    try {
      const response = await request(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          'user-agent': 'certwatch/1.0',
          ...options.headers,
        },
        body: JSON.stringify(payload),
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
        dispatcher: this.dispatcher,
        throwOnError: false,
      });

      const body = await response.body.text();

      return {
        statusCode: response.statusCode,
        body,
      };
    } catch (error) {
      throw new Error(
        `HTTP POST failed: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Close the agent and cleanup connections
   */
  async close() {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

/**
 * Build an HTTP Basic authorization header value
 */
export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

/**
 * Parse URL safely
 */
export function parseUrl(urlString: string): URL | null {
  try {
    return new URL(urlString);
  } catch {
    return null;
  }
}

/**
 * Validate an http(s) URL
 */
export function isValidUrl(urlString: string): boolean {
  const url = parseUrl(urlString);
  return url !== null && (url.protocol === 'http:' || url.protocol === 'https:');
}

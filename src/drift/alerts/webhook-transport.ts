/**
 * HTTP transport for webhook alerts
 */

import { errorMessage } from '../../utils/helpers';
import { DispatchError } from '../errors';

export interface WebhookTransport {
  post(url: string, payload: unknown, timeoutMs: number): Promise<void>;
}

/**
 * POSTs JSON with the global fetch; aborts after `timeoutMs`
 */
export class FetchWebhookTransport implements WebhookTransport {
  async post(url: string, payload: unknown, timeoutMs: number): Promise<void> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error && error.name === 'TimeoutError' ? `timed out after ${timeoutMs}ms` : errorMessage(error);
      throw new DispatchError(`Webhook request failed: ${reason}`, url, undefined, error);
    }

    if (!response.ok) {
      throw new DispatchError(`Webhook responded with HTTP ${response.status}`, url, response.status);
    }
  }
}

import type { Readable } from 'stream';
import axios from 'axios';

export interface WebhookRequest {
  url: string;
  /** Exact bytes to transmit; the signature is computed over these */
  body: Buffer;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface WebhookResponse {
  status: number;
}

/**
 * Outbound transport. Resolves with whatever status the receiver returned;
 * rejects only on timeout or transport failure.
 */
export interface WebhookSender {
  send(request: WebhookRequest): Promise<WebhookResponse>;
}

export class AxiosWebhookSender implements WebhookSender {
  async send(request: WebhookRequest): Promise<WebhookResponse> {
    const response = await axios.post<Readable>(request.url, request.body, {
      headers: request.headers,
      // socket idle timeout
      timeout: request.timeoutMs,
      // deadline for the whole call, however the receiver paces its bytes
      signal: AbortSignal.timeout(request.timeoutMs),
      maxRedirects: 0,
      // Keep the body as-is; never let axios re-serialize it
      transformRequest: [(data: unknown) => data],
      // only the status matters; the response body is never read
      responseType: 'stream',
      validateStatus: () => true,
    });

    response.data.destroy();
    return { status: response.status };
  }
}

/**
 * Short failure reason for logs, delivery records and dead letters
 */
export function describeSendError(error: unknown, timeoutMs: number): string {
  if (axios.isAxiosError(error)) {
    // ERR_CANCELED: the call deadline aborted the request
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED') {
      return `Timeout after ${timeoutMs}ms`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

export const webhookSender = new AxiosWebhookSender();

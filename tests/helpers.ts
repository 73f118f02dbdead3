import { closeDatabase } from '../src/storage/database';
import { runMigrations } from '../src/storage/migrate';
import type { WebhookRequest, WebhookResponse, WebhookSender } from '../src/modules/webhooks/sender';

/** Plain admin key whose SHA-256 is ADMIN_KEY in tests/setup.ts */
export const ADMIN_KEY_PLAIN = 'admin';

/**
 * Fresh in-memory database with the current schema
 */
export function resetDatabase(): void {
  closeDatabase();
  runMigrations();
}

type ScriptedResult = number | Error;

/**
 * Sender that answers from a script: a number is a response status,
 * an Error is thrown as a transport failure. The last entry repeats.
 */
export class ScriptedSender implements WebhookSender {
  readonly requests: WebhookRequest[] = [];

  constructor(private script: ScriptedResult[]) {}

  async send(request: WebhookRequest): Promise<WebhookResponse> {
    this.requests.push(request);
    const index = Math.min(this.requests.length - 1, this.script.length - 1);
    const next = this.script[index];
    if (next instanceof Error) {
      throw next;
    }
    return { status: next };
  }
}

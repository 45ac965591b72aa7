import { buildWebhookPayload } from './build-webhook-payload.ts';
import type { FetchFunction, Notifier } from './types.ts';

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 15_000;

export interface WebhookNotifierConfig {
  url: string;
  fetch?: FetchFunction;
  timeoutMS?: number;
}

export function createWebhookNotifier(config: WebhookNotifierConfig): Notifier {
  const fetchImpl = config.fetch ?? fetch;
  const timeoutMS = config.timeoutMS ?? DEFAULT_WEBHOOK_TIMEOUT_MS;

  return {
    name: 'webhook',

    async notify(event): Promise<void> {
      if (config.url === '') {
        return;
      }

      let response: Response;
      try {
        response = await fetchImpl(config.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(buildWebhookPayload(event)),
          signal: AbortSignal.timeout(timeoutMS),
        });
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`webhook request failed: ${detail}`, { cause: error });
      }

      // Release the connection; the body is never read.
      await response.body?.cancel();

      if (!response.ok) {
        throw new Error(`webhook returned non-2xx status: ${response.status}`);
      }
    },
  };
}

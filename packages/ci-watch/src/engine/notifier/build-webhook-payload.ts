import type { StatusChangeEvent } from '../../types.ts';
import { buildPullRequestURL } from '../github-client/build-pull-request-url.ts';
import { formatTimestamp } from './format-timestamp.ts';
import type { WebhookPayload } from './types.ts';

export function buildWebhookPayload(event: StatusChangeEvent): WebhookPayload {
  return {
    type: 'pr_status_change',
    owner: event.owner,
    repo: event.repo,
    pr_number: event.number,
    ...(event.title === '' ? {} : { title: event.title }),
    previous_state: event.previousState,
    current_state: event.currentState,
    sha: event.sha,
    url: buildPullRequestURL(event),
    timestamp: formatTimestamp(event.timestamp),
  };
}

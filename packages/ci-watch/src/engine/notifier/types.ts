import type { StatusChangeEvent } from '../../types.ts';

export interface Notifier {
  name: string;
  notify: (event: StatusChangeEvent) => Promise<void>;
}

export type WriteOutput = (text: string) => void;

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export type RunCommand = (command: string, args: readonly string[]) => Promise<void>;

export interface WebhookPayload {
  type: 'pr_status_change';
  owner: string;
  repo: string;
  pr_number: number;
  title?: string;
  previous_state: string;
  current_state: string;
  sha: string;
  url: string;
  timestamp: string;
}

export interface DeliveryFailure {
  sink: string;
  error: unknown;
}

import type { DeliveryFailure } from './types.ts';

export class NotificationDeliveryError extends Error {
  readonly failures: DeliveryFailure[];

  constructor(failures: DeliveryFailure[]) {
    const details = failures
      .map(({ sink, error }) => `${sink}: ${error instanceof Error ? error.message : String(error)}`)
      .join('; ');
    super(`Notification delivery failed (${details})`);
    this.name = 'NotificationDeliveryError';
    this.failures = failures;
  }
}

import { NotificationDeliveryError } from './errors.ts';
import type { DeliveryFailure, Notifier } from './types.ts';

/**
 * Delivers each event to every sink in order. A failing sink does not stop the
 * remaining ones; all failures are reported together once every sink was tried.
 */
export function createFanOutNotifier(sinks: readonly Notifier[]): Notifier {
  return {
    name: sinks.map((sink) => sink.name).join('+'),

    async notify(event): Promise<void> {
      const failures: DeliveryFailure[] = [];

      for (const sink of sinks) {
        try {
          await sink.notify(event);
        } catch (error) {
          failures.push({ sink: sink.name, error });
        }
      }

      if (failures.length > 0) {
        throw new NotificationDeliveryError(failures);
      }
    },
  };
}

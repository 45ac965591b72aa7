import { vi } from 'vitest';
import type { Notifier } from '../engine/notifier/types.ts';
import type { StatusChangeEvent } from '../types.ts';

export interface MockNotifierResult {
  notifier: Notifier;
  events: StatusChangeEvent[];
}

export function createMockNotifier(name = 'mock'): MockNotifierResult {
  const events: StatusChangeEvent[] = [];

  const notifier: Notifier = {
    name,
    notify: vi.fn<Notifier['notify']>().mockImplementation(async (event) => {
      events.push(event);
    }),
  };

  return { notifier, events };
}

import { vi } from 'vitest';
import type { ZmqPublisher } from './pubsub/publisher.js';

export function createMockZmqPublisher<T>(): ZmqPublisher<T> {
  return {
    send: vi.fn(() => Promise.resolve()),
    close: vi.fn(() => Promise.resolve()),
  };
}

import { vi } from 'vitest';
import type { WorkerBody } from './types.js';

interface PendingRequest {
  resolve: (reply: string) => void;
  reject: (error: unknown) => void;
}

/**
 * In-process stand-in for the monitor's request/acknowledge endpoint. In
 * auto mode every request is acknowledged at once; in manual mode requests
 * stay pending until `acknowledge` or `fail` is called.
 */
export function createFakeHeartbeatTransport(mode: 'auto' | 'manual' = 'auto') {
  const payloads: string[] = [];
  const pending: PendingRequest[] = [];

  const transport = {
    payloads,
    request: vi.fn((payload: string): Promise<string> => {
      payloads.push(payload);
      if (mode === 'auto') {
        return Promise.resolve('ok');
      }
      return new Promise<string>((resolve, reject) => {
        pending.push({ resolve, reject });
      });
    }),
    records: (): unknown[] => payloads.map((payload): unknown => JSON.parse(payload)),
    pendingCount: (): number => pending.length,
    acknowledge: (reply = 'ok'): void => {
      pending.shift()?.resolve(reply);
    },
    fail: (error: unknown): void => {
      pending.shift()?.reject(error);
    },
  };

  return transport;
}

export type FakeHeartbeatTransport = ReturnType<typeof createFakeHeartbeatTransport>;

/**
 * In-process stand-in for the monitor's broadcast channel. Messages pushed
 * before a receive are queued; `close` rejects a pending receive the way a
 * closed socket does.
 */
export function createFakeControlTransport() {
  const queued: string[] = [];
  const waiting: PendingRequest[] = [];
  let closed = false;

  const transport = {
    receive: vi.fn((): Promise<string> => {
      if (closed) {
        return Promise.reject(new Error('Socket is closed'));
      }
      const next = queued.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      return new Promise<string>((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    }),
    push: (message: string | Record<string, unknown>): void => {
      const raw = typeof message === 'string' ? message : JSON.stringify(message);
      const receiver = waiting.shift();
      if (receiver) {
        receiver.resolve(raw);
      } else {
        queued.push(raw);
      }
    },
    fail: (error: unknown): void => {
      waiting.shift()?.reject(error);
    },
    close: (): void => {
      closed = true;
      for (const receiver of waiting.splice(0)) {
        receiver.reject(new Error('Socket is closed'));
      }
    },
  };

  return transport;
}

export type FakeControlTransport = ReturnType<typeof createFakeControlTransport>;

export function createMockWorkerBody(overrides?: Partial<WorkerBody>): WorkerBody {
  return {
    publish: vi.fn(() => Promise.resolve()),
    subscribe: vi.fn(() => Promise.resolve()),
    ...overrides,
  };
}

/**
 * Attaches a handler right away so a rejection that happens while fake
 * timers advance is not reported as unhandled.
 */
export function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('Expected the promise to reject');
    },
    (error: unknown) => error,
  );
}

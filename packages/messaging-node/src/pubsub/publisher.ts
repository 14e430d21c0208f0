import { SF } from '@fleetctl/service-framework-node';
import * as zmq from 'zeromq';

interface ZmqPublisherOptions {
  endpoint: string;
  diagnosticContext: SF.DiagnosticContext;
}

export interface ZmqPublisher<T> {
  send: (message: T) => Promise<void>;
  close: () => Promise<void>;
}

/**
 * Binds a PUB socket. Messages sent while a previous send is still in flight
 * are queued and flushed as multipart batches of up to 100 frames.
 */
export async function createZmqPublisher<T>(
  options: ZmqPublisherOptions,
): Promise<ZmqPublisher<T>> {
  const { diagnosticContext, endpoint } = options;
  const socket = new zmq.Publisher();
  const pending: string[] = [];
  let sendingPromise: Promise<void> | null = null;

  await socket.bind(endpoint);
  diagnosticContext.logger.info('[ZmqPublisher] Bound', { endpoint });

  return {
    send: async (message: T): Promise<void> => {
      const serialized = JSON.stringify(message);

      if (sendingPromise) {
        pending.push(serialized);
        return;
      }

      sendingPromise = socket.send(serialized);
      try {
        await sendingPromise;

        while (pending.length > 0) {
          sendingPromise = socket.send(pending.splice(0, 100));
          await sendingPromise;
        }
      } finally {
        sendingPromise = null;
      }

      diagnosticContext.logger.debug('[ZmqPublisher] Sent', { endpoint });
    },
    close: async (): Promise<void> => {
      while (sendingPromise) {
        await sendingPromise;
      }
      socket.close();
    },
  };
}

import { SF } from '@fleetctl/service-framework-node';
import * as zmq from 'zeromq';

interface ZmqSubscriberOptions {
  endpoint: string;
  diagnosticContext: SF.DiagnosticContext;
}

export interface ZmqSubscriber {
  connect: () => void;
  receive: () => Promise<string>;
  close: () => void;
}

export function createZmqSubscriber(options: ZmqSubscriberOptions): ZmqSubscriber {
  const { diagnosticContext, endpoint } = options;
  const socket = new zmq.Subscriber();
  // frames of a multipart message not yet handed out
  const pendingFrames: string[] = [];

  return {
    connect: (): void => {
      diagnosticContext.logger.info('[ZmqSubscriber] Connecting', { endpoint });
      socket.connect(endpoint);
      // no topic filter, every message on the endpoint is delivered
      socket.subscribe();
    },
    receive: async (): Promise<string> => {
      const buffered = pendingFrames.shift();
      if (buffered !== undefined) {
        return buffered;
      }

      const frames = await socket.receive();
      const [first, ...rest] = frames.map((frame) => frame.toString());
      if (first === undefined) {
        throw new Error(`[ZmqSubscriber] Received a message without frames on ${endpoint}`);
      }
      pendingFrames.push(...rest);
      return first;
    },
    close: (): void => {
      socket.close();
    },
  };
}

import { SF } from '@fleetctl/service-framework-node';
import * as zmq from 'zeromq';

interface ZmqRequestClientOptions {
  endpoint: string;
  diagnosticContext: SF.DiagnosticContext;
}

export interface ZmqRequestClient {
  connect: () => void;
  request: (payload: string) => Promise<string>;
  close: () => void;
}

/**
 * Strict send/receive alternation over a REQ socket. No receive timeout is
 * set, so `request` stays pending until the peer replies.
 */
export function createZmqRequestClient(options: ZmqRequestClientOptions): ZmqRequestClient {
  const { diagnosticContext, endpoint } = options;
  const socket = new zmq.Request();

  return {
    connect: (): void => {
      diagnosticContext.logger.info('[ZmqRequestClient] Connecting', { endpoint });
      socket.connect(endpoint);
    },
    request: async (payload: string): Promise<string> => {
      await socket.send(payload);
      const [reply] = await socket.receive();
      return reply?.toString() ?? '';
    },
    close: (): void => {
      socket.close();
    },
  };
}

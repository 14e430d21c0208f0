import type { SF } from '@fleetctl/service-framework-node';
import { TB } from '@fleetctl/service-framework-node/typebox';
import { Value } from '@sinclair/typebox/value';
import { ControlMessageError } from './errors.js';
import type { ServiceLifecycle } from './lifecycle.js';
import type { WorkerServiceMetrics } from './metrics.js';
import type { ControlCommand, ControlTransport } from './types.js';

// only key presence is required, values are compared as they arrive
const addressedMessageSchema = TB.Object({ sid: TB.Unknown() });
const controlCommandSchema = TB.Object({ sid: TB.Unknown(), action: TB.Unknown() });

export type ControlOutcome = 'foreign' | 'applied' | 'ignored' | 'malformed';

export type ParsedControlMessage =
  | { addressed: false }
  | { addressed: true; command: ControlCommand };

function describeErrors(schema: TB.TSchema, value: unknown): string[] {
  return [...Value.Errors(schema, value)].map((error) => `${error.path}: ${error.message}`);
}

/**
 * Checks only what is needed to route the message: a `sid` key on every
 * message, and an `action` key once the `sid` matches. A `sid` of any other
 * value, of whatever type, belongs to another worker and is not inspected
 * further.
 */
export function parseControlMessage(rawMessage: string, sid: string): ParsedControlMessage {
  let message: unknown;
  try {
    message = JSON.parse(rawMessage);
  } catch (error) {
    throw new ControlMessageError('Control message is not valid JSON', rawMessage, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!Value.Check(addressedMessageSchema, message)) {
    throw new ControlMessageError(
      'Control message has no sid',
      rawMessage,
      describeErrors(addressedMessageSchema, message),
    );
  }

  if (message.sid !== sid) {
    return { addressed: false };
  }

  if (!Value.Check(controlCommandSchema, message)) {
    throw new ControlMessageError(
      'Control message has no action',
      rawMessage,
      describeErrors(controlCommandSchema, message),
    );
  }

  return { addressed: true, command: { sid, action: message.action } };
}

export interface ControlListenerOptions {
  lifecycle: ServiceLifecycle;
  transport: ControlTransport;
  diagnosticContext: SF.DiagnosticContext;
  metrics: WorkerServiceMetrics;
  discardMalformed?: boolean;
}

export function createControlListener(options: ControlListenerOptions) {
  const { lifecycle, transport, diagnosticContext, metrics } = options;
  const discardMalformed = options.discardMalformed ?? false;
  const logger = diagnosticContext.logger;
  const sid = lifecycle.sid;

  async function handleMessage(rawMessage: string): Promise<ControlOutcome> {
    let parsed: ParsedControlMessage;
    try {
      parsed = parseControlMessage(rawMessage, sid);
    } catch (error) {
      if (!(error instanceof ControlMessageError)) {
        throw error;
      }

      metrics.controlCommands.inc({ action: 'unknown', outcome: 'malformed' });
      if (!discardMalformed) {
        throw error;
      }

      logger.warn(`Discarding malformed control message: ${error.message}`, {
        sid,
        rawMessage: error.rawMessage,
        validationErrors: error.validationErrors,
      });
      return 'malformed';
    }

    if (!parsed.addressed) {
      return 'foreign';
    }

    const { action } = parsed.command;

    if (action === 'stop') {
      await lifecycle.stop('control');
      metrics.controlCommands.inc({ action: 'stop', outcome: 'applied' });
      return 'applied';
    }

    if (action === 'start') {
      // re-entry goes through run, skipping the starting state of the boot path
      await lifecycle.run('control');
      metrics.controlCommands.inc({ action: 'start', outcome: 'applied' });
      return 'applied';
    }

    metrics.controlCommands.inc({ action: 'other', outcome: 'ignored' });
    logger.debug('Ignoring control action', { sid, action });
    return 'ignored';
  }

  async function run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      let rawMessage: string;
      try {
        rawMessage = await transport.receive();
      } catch (error) {
        if (signal?.aborted) {
          return;
        }
        throw error;
      }

      await handleMessage(rawMessage);
    }
  }

  return {
    handleMessage,
    run,
  };
}

export type ControlListener = ReturnType<typeof createControlListener>;

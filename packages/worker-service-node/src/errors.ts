import { serviceStates } from './serviceState.js';

export class InvalidStateError extends Error {
  constructor(public readonly state: unknown) {
    super(`Invalid service state '${String(state)}', expected one of: ${serviceStates.join(', ')}`);
    this.name = 'InvalidStateError';
  }

  toErrorPlainObject(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      state: String(this.state),
    };
  }
}

export class ControlMessageError extends Error {
  constructor(
    message: string,
    public readonly rawMessage: string,
    public readonly validationErrors: string[] = [],
  ) {
    super(message);
    this.name = 'ControlMessageError';
  }

  toErrorPlainObject(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      rawMessage: this.rawMessage,
      validationErrors: this.validationErrors,
    };
  }
}

import { Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';
import { createEnvContext, createEnvParser } from './environment.js';

describe('createEnvParser', () => {
  describe('parse', () => {
    it('should apply schema defaults for missing variables', () => {
      const schema = Type.Object({
        SERVICE_ID: Type.String({ default: 'servicebase' }),
        MONITOR_HEARTBEAT_ENDPOINT: Type.String({ default: 'tcp://localhost:8810' }),
      });

      const config = createEnvParser().parse(schema, { source: {} });

      expect(config).toEqual({
        SERVICE_ID: 'servicebase',
        MONITOR_HEARTBEAT_ENDPOINT: 'tcp://localhost:8810',
      });
    });

    it('should treat empty strings as missing', () => {
      const schema = Type.Object({
        SERVICE_ID: Type.String({ default: 'servicebase' }),
      });

      const config = createEnvParser().parse(schema, { source: { SERVICE_ID: '' } });

      expect(config.SERVICE_ID).toBe('servicebase');
    });

    it('should coerce integers', () => {
      const schema = Type.Object({
        PORT: Type.Integer(),
        TICK_INTERVAL_MS: Type.Number(),
      });

      const config = createEnvParser().parse(schema, {
        source: { PORT: '3100', TICK_INTERVAL_MS: '250' },
      });

      expect(config.PORT).toBe(3100);
      expect(config.TICK_INTERVAL_MS).toBe(250);
    });

    it.each([
      ['true', true],
      ['YES', true],
      ['1', true],
      ['off', false],
      ['0', false],
    ])('should coerce %s to boolean %s', (raw, expected) => {
      const schema = Type.Object({
        CONTROL_DISCARD_MALFORMED: Type.Boolean(),
      });

      const config = createEnvParser().parse(schema, {
        source: { CONTROL_DISCARD_MALFORMED: raw },
      });

      expect(config.CONTROL_DISCARD_MALFORMED).toBe(expected);
    });

    it('should reject values that cannot be coerced', () => {
      const schema = Type.Object({
        PORT: Type.Integer(),
      });

      expect(() => createEnvParser().parse(schema, { source: { PORT: 'eighty' } })).toThrow(
        'Configuration validation failed:\n  - PORT: Expected integer, received "eighty"',
      );
    });

    it('should reject missing required variables', () => {
      const schema = Type.Object({
        SERVICE_ID: Type.String(),
      });

      expect(() => createEnvParser().parse(schema, { source: {} })).toThrow(
        'Configuration validation failed',
      );
    });

    it('should accept literal unions and reject other values', () => {
      const schema = Type.Object({
        LOG_FORMAT: Type.Union([Type.Literal('json'), Type.Literal('human')]),
      });
      const parser = createEnvParser();

      expect(parser.parse(schema, { source: { LOG_FORMAT: 'json' } }).LOG_FORMAT).toBe('json');
      expect(() => parser.parse(schema, { source: { LOG_FORMAT: 'xml' } })).toThrow(
        'Configuration validation failed',
      );
    });

    it('should redact sensitive values in error messages', () => {
      const schema = Type.Object({
        MONITOR_AUTH_TOKEN: Type.String({ minLength: 10 }),
      });

      expect(() =>
        createEnvParser().parse(schema, { source: { MONITOR_AUTH_TOKEN: 'test' } }),
      ).toThrow('  - MONITOR_AUTH_TOKEN: Expected string length greater or equal to 10, received "[REDACTED]"');
    });

    it('should parse JSON strings for object types', () => {
      const schema = Type.Object({
        HEARTBEAT_INFOS: Type.Object({ kind: Type.String() }),
      });

      const config = createEnvParser().parse(schema, {
        source: { HEARTBEAT_INFOS: '{"kind":"ticker"}' },
      });

      expect(config.HEARTBEAT_INFOS).toEqual({ kind: 'ticker' });
    });

    it('should read process.env when no source is given', () => {
      const schema = Type.Object({
        FLEETCTL_ENV_PARSER_PROBE: Type.String({ default: 'unset' }),
      });

      process.env.FLEETCTL_ENV_PARSER_PROBE = 'from-process';
      try {
        expect(createEnvParser().parse(schema).FLEETCTL_ENV_PARSER_PROBE).toBe('from-process');
      } finally {
        delete process.env.FLEETCTL_ENV_PARSER_PROBE;
      }
    });
  });

  describe('validate', () => {
    it('should return validation errors without throwing', () => {
      const schema = Type.Object({
        PORT: Type.Number(),
        HOST: Type.String(),
      });

      const result = createEnvParser().validate(schema, { PORT: 'invalid' });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((error) => error.path)).toContain('PORT');
        expect(result.errors.map((error) => error.path)).toContain('HOST');
      }
    });

    it('should return the typed configuration when valid', () => {
      const schema = Type.Object({
        PORT: Type.Number(),
      });

      const result = createEnvParser().validate(schema, { PORT: 3000 });

      expect(result).toEqual({ valid: true, config: { PORT: 3000 } });
    });
  });
});

describe('createEnvContext', () => {
  it('should expose NODE_ENV as nodeEnv', () => {
    const schema = Type.Object({
      PROCESS_NAME: Type.String({ minLength: 1 }),
      NODE_ENV: Type.String(),
      PORT: Type.Integer(),
    });

    const context = createEnvContext(schema, {
      source: { PROCESS_NAME: 'ticker-worker', NODE_ENV: 'production', PORT: '3100' },
    });

    expect(context.config).toEqual({
      PROCESS_NAME: 'ticker-worker',
      NODE_ENV: 'production',
      PORT: 3100,
    });
    expect(context.nodeEnv).toBe('production');
  });

  it('should default nodeEnv to development', () => {
    const schema = Type.Object({
      PROCESS_NAME: Type.String({ minLength: 1 }),
    });

    const context = createEnvContext(schema, { source: { PROCESS_NAME: 'ticker-worker' } });

    expect(context.nodeEnv).toBe('development');
  });
});

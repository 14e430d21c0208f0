import { Value } from '@sinclair/typebox/value';
import { isPlainRecord } from '@fleetctl/utils';
import { TB } from '../typebox.js';
import type {
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
  ParsedEnv,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function redactValue(key: string, value: unknown): unknown {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(key)) ? '[REDACTED]' : value;
}

function schemaTypeOf(schema: TB.TSchema): string {
  if ('type' in schema && typeof schema.type === 'string') {
    return schema.type;
  }
  return 'unknown';
}

function coerceEnvironmentValue(value: string, targetType: string): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Cannot convert "${value}" to number`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (TRUE_VALUES.includes(lower)) return true;
      if (FALSE_VALUES.includes(lower)) return false;
      throw new Error(`Cannot convert "${value}" to boolean`);
    }
    case 'object':
    case 'array':
      return JSON.parse(value);
    default:
      return value;
  }
}

// Values that cannot be coerced are passed through untouched so that schema
// validation reports them against the offending key.
function coerceEnvValues(source: EnvSource, schema: TB.TObject): Record<string, unknown> {
  const coerced: Record<string, unknown> = {};

  for (const [key, propertySchema] of Object.entries(schema.properties)) {
    const value = source[key];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      coerced[key] = coerceEnvironmentValue(value, schemaTypeOf(propertySchema));
    } catch {
      coerced[key] = value;
    }
  }

  return coerced;
}

function collectValidationErrors(
  schema: TB.TObject,
  value: unknown,
  redactSensitive: boolean,
): EnvValidationError[] {
  return Array.from(Value.Errors(schema, value), (error) => {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.') || 'root';

    return {
      path,
      message: error.message,
      value: redactSensitive ? redactValue(path, error.value) : error.value,
    };
  });
}

function formatValidationErrors(errors: EnvValidationError[]): string {
  const lines = errors.map((error) => {
    const received = error.value !== undefined ? `, received ${JSON.stringify(error.value)}` : '';
    return `  - ${error.path}: ${error.message}${received}`;
  });

  return ['Configuration validation failed:', ...lines].join('\n');
}

export function createEnvParser(): EnvParser {
  function validate<T extends TB.TObject>(
    schema: T,
    source: unknown,
    config: EnvParserConfig = {},
  ): ParsedEnv<TB.Static<T>> {
    if (Value.Check(schema, source)) {
      return { valid: true, config: source };
    }

    return {
      valid: false,
      errors: collectValidationErrors(schema, source, config.redactSensitive ?? true),
    };
  }

  function parse<T extends TB.TObject>(schema: T, config: EnvParserConfig = {}): TB.Static<T> {
    const source = config.source ?? process.env;
    const withDefaults = Value.Default(schema, coerceEnvValues(source, schema));
    const result = validate(schema, withDefaults, config);

    if (!result.valid) {
      throw new Error(formatValidationErrors(result.errors));
    }

    return result.config;
  }

  return {
    parse,
    validate,
  };
}

function readNodeEnv(config: unknown): string {
  return isPlainRecord(config) && typeof config.NODE_ENV === 'string'
    ? config.NODE_ENV
    : 'development';
}

export function createEnvContext<T extends TB.TObject>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<TB.Static<T>> {
  const parsedConfig = createEnvParser().parse(schema, config);

  return {
    config: parsedConfig,
    nodeEnv: readNodeEnv(parsedConfig),
  };
}

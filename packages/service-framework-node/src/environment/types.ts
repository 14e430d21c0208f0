import { type Static, type TObject, Type } from '@sinclair/typebox';

export interface EnvValidationError {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export type ParsedEnv<T> =
  | { readonly valid: true; readonly config: T }
  | { readonly valid: false; readonly errors: EnvValidationError[] };

export type EnvSource = Record<string, string | undefined>;

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: EnvSource;
}

export interface EnvParser {
  parse<T extends TObject>(schema: T, config?: EnvParserConfig): Static<T>;
  validate<T extends TObject>(
    schema: T,
    source: unknown,
    config?: EnvParserConfig,
  ): ParsedEnv<Static<T>>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export interface DefaultEnv {
  PROCESS_NAME: string;
}

export const DefaultEnvSchemaType = Type.Object({
  PROCESS_NAME: Type.String({ minLength: 1 }),
});
export type DefaultEnvSchemaType = typeof DefaultEnvSchemaType;
export type DefaultEnvSchema = Static<DefaultEnvSchemaType>;

export type DefaultEnvContext = EnvContext<DefaultEnv>;

import { type Static, type TSchema, Type } from '@sinclair/typebox';

export interface ParsedEnv<T> {
  readonly config: T;
  readonly errors?: EnvValidationError[];
}

export interface EnvValidationError {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: EnvSource;
}

export interface EnvParser {
  parse<T extends TSchema>(schema: T, config?: EnvParserConfig): Static<T>;

  validate<T extends TSchema>(
    schema: T,
    source: Record<string, unknown>,
    config?: EnvParserConfig,
  ): ParsedEnv<Static<T>>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export type EnvSource = Record<string, string | undefined>;

export interface DefaultEnv {
  PROCESS_NAME: string;
}

export type DefaultEnvContext = EnvContext<DefaultEnv>;

/**
 * Schema fragments for the diagnostics settings every process accepts.
 * Spread into a process schema so LOG_LEVEL and LOG_FORMAT arrive typed.
 */
export const LogSeveritySchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('fatal'),
]);

export const LogOutputFormatSchema = Type.Union([
  Type.Literal('json'),
  Type.Literal('human'),
  Type.Literal('structured-text'),
]);

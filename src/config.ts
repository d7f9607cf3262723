/**
 * Run configuration, read once at process start.
 *
 * Values come from the active ConfigProvider (the process environment by
 * default, after `.env` has been loaded by the entry point). The resulting
 * struct is handed to each step explicitly.
 */

import { Config, ConfigError, Either, Effect, LogLevel, Option, pipe } from 'effect';
import { ConfigurationError } from './errors';

interface EtlConfig {
  readonly feedUrl: string;
  readonly mongoUri: Option.Option<string>;
  readonly database: string;
  readonly collection: string;
  readonly logLevel: LogLevel.LogLevel;
}

const DEFAULT_DATABASE = 'etl_db';
const DEFAULT_COLLECTION = 'cisa_kev';

const LOG_LEVELS: Record<string, LogLevel.LogLevel> = {
  TRACE: LogLevel.Trace,
  DEBUG: LogLevel.Debug,
  INFO: LogLevel.Info,
  WARN: LogLevel.Warning,
  WARNING: LogLevel.Warning,
  ERROR: LogLevel.Error,
  CRITICAL: LogLevel.Fatal,
  FATAL: LogLevel.Fatal,
  NONE: LogLevel.None,
  OFF: LogLevel.None,
};

const parseLogLevel = (raw: string): Either.Either<LogLevel.LogLevel, ConfigError.ConfigError> => {
  const level = LOG_LEVELS[raw.trim().toUpperCase()];
  return level === undefined
    ? Either.left(ConfigError.InvalidData(['LOG_LEVEL'], `Unknown log level "${raw}"`))
    : Either.right(level);
};

const etlConfig: Config.Config<EtlConfig> = Config.all({
  feedUrl: Config.nonEmptyString('CISA_KEV_URL'),
  mongoUri: Config.option(Config.nonEmptyString('MONGO_URI')),
  database: Config.withDefault(Config.nonEmptyString('MONGO_DB'), DEFAULT_DATABASE),
  collection: Config.withDefault(Config.nonEmptyString('MONGO_COLLECTION'), DEFAULT_COLLECTION),
  logLevel: Config.withDefault(
    Config.mapOrFail(Config.string('LOG_LEVEL'), parseLogLevel),
    LogLevel.Info
  ),
});

const loadConfig: Effect.Effect<EtlConfig, ConfigurationError> = pipe(
  etlConfig,
  Effect.mapError(
    (error) =>
      new ConfigurationError({
        message: `Invalid configuration: ${String(error)}`,
        cause: error,
      })
  )
);

export { loadConfig, parseLogLevel, DEFAULT_DATABASE, DEFAULT_COLLECTION };
export type { EtlConfig };

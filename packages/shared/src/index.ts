export {
  EnvConfigError,
  loadEnvConfig,
  booleanVar,
  integerVar,
  numberVar,
  stringVar,
  stringListVar,
  type EnvSource,
  type LoadEnvConfigOptions,
  type BooleanVarOptions,
  type NumberVarOptions,
  type StringVarOptions,
  type StringListVarOptions
} from './envConfig';
export {
  LOG_LEVELS,
  createLogger,
  createLoggerOptions,
  fromPino,
  noopLogger,
  type LogLevel,
  type ServiceLogger
} from './logger';

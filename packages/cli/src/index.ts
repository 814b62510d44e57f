/**
 * @longflag/cli
 *
 * Command-line front end for the change evaluator
 */

export {
  runCli,
  parseArgs,
  configFromFlags,
  createConnector,
  describeError,
  UsageError,
  USAGE,
} from './run.js';
export type { CliFlags, CliIO } from './run.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  inferSourceType,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, OutputFormat, SourceConfig } from './config.js';
export { Logger } from './logger.js';
export type { LogFormat, LogLevel, LogSink } from './logger.js';
export { renderReport, toCsvCell } from './output.js';

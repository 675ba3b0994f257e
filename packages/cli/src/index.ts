/**
 * @schemabridge/cli
 *
 * Config-driven command line for mapping API payloads into database tables.
 */

export { runCommand, isCommandName, COMMANDS } from './commands.js';
export type {
  CommandName,
  CommandDeps,
  CommandResult,
  SchemaReport,
  ImportReport,
  FailureReport,
} from './commands.js';
export { parseArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
export {
  ConfigError,
  configFileSchema,
  targetSchema,
  expandEnvVars,
  formatZodError,
  parseConfig,
  loadConfig,
} from './config.js';
export type { ConfigFile, SourceConfig, TargetConfig, EnvExpansionOptions } from './config.js';
export { createStorageEngine } from './targets.js';

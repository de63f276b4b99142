export { runCli, readPackageVersion } from "./cli";
export type { CliDependencies } from "./cli";
export { parseArgs, HELP_TEXT } from "./args";
export type { CliCommand, GenerateCommand } from "./args";
export { loadConfig, ConfigError, CONFIG_FILE_NAME } from "./config-loader";
export type { LoadedConfig, LoadConfigOptions } from "./config-loader";
export { cliConfigSchema } from "./config";
export type { CLIConfig } from "./config";
export {
  formatBuildReport,
  formatProgress,
  formatSchemaRejection,
  formatValidationReport,
} from "./reporter";

import { readFileSync } from "fs";
import { resolve } from "path";
import { Logger, getErrorMessage, z } from "@slidesmith/utils";
import { validateFile } from "@slidesmith/schema";
import {
  AssetMaterializer,
  OpenAIImageGenerator,
  SharpImageProcessor,
} from "@slidesmith/assets";
import type { ImageGenerator, ImageProcessor } from "@slidesmith/assets";
import { BuildOrchestrator } from "@slidesmith/builder";
import { FileSystemVersionManager } from "@slidesmith/versioning";
import { HELP_TEXT, parseArgs } from "./args";
import type { GenerateCommand } from "./args";
import { loadConfig } from "./config-loader";
import type { LoadedConfig } from "./config-loader";
import {
  formatBuildReport,
  formatProgress,
  formatSchemaRejection,
  formatValidationReport,
} from "./reporter";

export interface CliDependencies {
  env: Record<string, string | undefined>;
  cwd: string;
  print: (line: string) => void;
  printError: (line: string) => void;
  signal?: AbortSignal | undefined;
  /** Defaults to the process-wide logger writing to stderr */
  logger?: Logger | undefined;
  createGenerator?: ((apiKey: string, logger: Logger) => ImageGenerator) | undefined;
  createProcessor?: (() => ImageProcessor) | undefined;
}

const packageJsonSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return packageJsonSchema.parse(JSON.parse(raw)).version;
}

/**
 * Run one CLI invocation and return the process exit code
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies,
): Promise<number> {
  const command = parseArgs(argv);

  switch (command.kind) {
    case "help":
      deps.print(HELP_TEXT);
      return 0;
    case "version":
      deps.print(`slidesmith v${readPackageVersion()}`);
      return 0;
    case "usage-error":
      deps.printError(`❌ ${command.message}`);
      deps.printError("Run `slidesmith --help` for usage.");
      return 1;
    case "validate":
      return runValidate(resolve(deps.cwd, command.schemaPath), deps);
    case "generate":
      return runGenerate(command, deps);
  }
}

async function runValidate(
  schemaPath: string,
  deps: CliDependencies,
): Promise<number> {
  const result = await validateFile(schemaPath);
  formatValidationReport(schemaPath, result).forEach((line) => deps.print(line));
  return result.valid ? 0 : 1;
}

async function runGenerate(
  command: GenerateCommand,
  deps: CliDependencies,
): Promise<number> {
  let config: LoadedConfig;
  try {
    config = loadConfig({ cwd: deps.cwd, env: deps.env, configPath: command.configPath });
  } catch (error) {
    deps.printError(`❌ ${getErrorMessage(error)}`);
    return 1;
  }

  // schema faults come before missing credentials
  const schemaPath = resolve(deps.cwd, command.schemaPath);
  const validation = await validateFile(schemaPath);
  if (!validation.valid) {
    formatSchemaRejection(schemaPath, validation).forEach((line) => deps.printError(line));
    return 1;
  }

  const apiKey = config.secrets.openaiApiKey;
  if (!apiKey) {
    deps.printError("❌ OPENAI_API_KEY environment variable is required");
    return 1;
  }

  const logger =
    deps.logger ??
    Logger.getInstance({ level: config.logLevel, context: "slidesmith", useStderr: true });
  const generator = deps.createGenerator
    ? deps.createGenerator(apiKey, logger)
    : new OpenAIImageGenerator({ apiKey }, logger);
  const processor = deps.createProcessor?.() ?? new SharpImageProcessor();

  const orchestrator = new BuildOrchestrator({
    materializer: new AssetMaterializer({
      generator,
      processor,
      logger,
      config: {
        ...config.materializer,
        ...(command.concurrency !== undefined ? { concurrency: command.concurrency } : {}),
      },
    }),
    versionManager: new FileSystemVersionManager({ logger }),
    logger,
    config: {
      ...config.build,
      ...(command.templateDir !== undefined
        ? { templateDir: resolve(deps.cwd, command.templateDir) }
        : {}),
    },
  });

  deps.print(`🎭 Building ${schemaPath}`);

  const report = await orchestrator.build(schemaPath, {
    outputDir: command.outputDir !== undefined ? resolve(deps.cwd, command.outputDir) : undefined,
    versioned: command.versioned,
    signal: deps.signal,
    onProgress: (notification) => deps.print(formatProgress(notification)),
  });

  const write = report.state === "done" ? deps.print : deps.printError;
  formatBuildReport(report).forEach((line) => write(line));
  return report.state === "done" ? 0 : 1;
}

export interface GenerateCommand {
  kind: "generate";
  schemaPath: string;
  outputDir: string | undefined;
  versioned: boolean;
  templateDir: string | undefined;
  concurrency: number | undefined;
  configPath: string | undefined;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "validate"; schemaPath: string }
  | GenerateCommand
  | { kind: "usage-error"; message: string };

function usageError(message: string): CliCommand {
  return { kind: "usage-error", message };
}

/**
 * Split `--flag=value` into its parts
 */
function splitFlag(arg: string): [string, string | undefined] {
  if (!arg.startsWith("--")) return [arg, undefined];
  const index = arg.indexOf("=");
  return index === -1 ? [arg, undefined] : [arg.slice(0, index), arg.slice(index + 1)];
}

export function parseArgs(argv: readonly string[]): CliCommand {
  if (argv.includes("--help") || argv.includes("-h")) {
    return { kind: "help" };
  }
  if (argv.includes("--version") || argv.includes("-v")) {
    return { kind: "version" };
  }

  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
      return usageError("missing command");
    case "validate":
      return parseValidateArgs(rest);
    case "generate":
      return parseGenerateArgs(rest);
    default:
      return usageError(`unknown command: ${command}`);
  }
}

function parseValidateArgs(args: readonly string[]): CliCommand {
  const unknown = args.find((arg) => arg.startsWith("-"));
  if (unknown !== undefined) {
    return usageError(`unknown option for validate: ${unknown}`);
  }
  const [schemaPath, ...extra] = args;
  if (schemaPath === undefined || extra.length > 0) {
    return usageError("validate takes exactly one schema file");
  }
  return { kind: "validate", schemaPath };
}

function parseGenerateArgs(args: readonly string[]): CliCommand {
  const positionals: string[] = [];
  const command: Omit<GenerateCommand, "schemaPath"> = {
    kind: "generate",
    outputDir: undefined,
    versioned: true,
    templateDir: undefined,
    concurrency: undefined,
    configPath: undefined,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    const [flag, inlineValue] = splitFlag(arg);
    const takeValue = (): string | undefined => inlineValue ?? args[++i];

    switch (flag) {
      case "--output":
      case "-o": {
        const value = takeValue();
        if (!value) return usageError(`${flag} requires a directory`);
        command.outputDir = value;
        break;
      }
      case "--no-version":
        command.versioned = false;
        break;
      case "--template-dir": {
        const value = takeValue();
        if (!value) return usageError(`${flag} requires a directory`);
        command.templateDir = value;
        break;
      }
      case "--config": {
        const value = takeValue();
        if (!value) return usageError(`${flag} requires a file`);
        command.configPath = value;
        break;
      }
      case "--concurrency": {
        const value = takeValue();
        const concurrency = Number(value);
        if (!value || !Number.isInteger(concurrency) || concurrency < 1) {
          return usageError(
            `--concurrency must be a positive integer, got: ${value ?? "nothing"}`,
          );
        }
        command.concurrency = concurrency;
        break;
      }
      default:
        if (arg.startsWith("-")) {
          return usageError(`unknown option for generate: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  const [schemaPath, ...extra] = positionals;
  if (schemaPath === undefined || extra.length > 0) {
    return usageError("generate takes exactly one schema file");
  }
  return { ...command, schemaPath };
}

export const HELP_TEXT = `
slidesmith - validate presentation schemas and build versioned slide assets

Usage:
  slidesmith validate <schema.json>
  slidesmith generate <schema.json> [options]

Generate options:
  --output, -o <dir>      Build into this directory (no versioning)
  --no-version            Build into build/<short_name> and overwrite it
  --template-dir <dir>    Copy presentation.html and README.md from here
  --concurrency <n>       Number of assets generated at the same time
  --config <file>         Configuration file (default: ./slidesmith.config.yaml)

Options:
  --help, -h              Show this help message
  --version, -v           Show version information

Environment:
  OPENAI_API_KEY          Required for generate
  LOG_LEVEL               silly, verbose, debug, info, warn, error or none
  SLIDESMITH_CONCURRENCY  Default for --concurrency

Examples:
  slidesmith validate presentation.json
  slidesmith generate presentation.json
  slidesmith generate presentation.json -o dist/talk --concurrency 3
`;

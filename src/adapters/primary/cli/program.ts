import * as path from "path";
import { Command, InvalidArgumentError } from "commander";
import { version } from "../../../../package.json";
import { FsAdapter } from "../../secondary/fs/FsAdapter";
import { createContainer } from "./di/dependencyContainer";
import { loadConfigFile } from "./config/loadConfigFile";
import { CliFlags, resolveOptions } from "./config/resolveOptions";
import { DEFAULT_CONFIG_FILE } from "./config/defaults";
import { RepoDigestConfig } from "./config/ConfigSchema";

interface ProgramOptions {
  output?: string;
  config?: string;
  ignoreFile?: string;
  gitignore: boolean;
  defaultIgnores?: boolean;
  ignore?: string[];
  skip?: string[];
  ext?: string[];
  name?: string[];
  top?: number;
  summary: boolean;
  tree: boolean;
  logFile?: string;
  verbose?: boolean;
}

function parseTop(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

export function buildProgram(
  fsAdapter: FsAdapter = new FsAdapter(),
  cwd: string = process.cwd()
): Command {
  const program = new Command();

  program
    .name("repo-digest")
    .description(
      "Packs the files of a repository into a single document and reports token metrics"
    )
    .version(version)
    .argument("[root]", "repository root to walk")
    .option("-o, --output <file>", "output document path")
    .option("-c, --config <file>", `JSON config file (default: ./${DEFAULT_CONFIG_FILE} if present)`)
    .option("-i, --ignore-file <file>", "gitignore-syntax file; must exist")
    .option("--no-gitignore", "do not read <root>/.gitignore")
    .option("--default-ignores", "add built-in patterns for binaries, builds and lock files")
    .option("--ignore <patterns...>", "extra gitignore-syntax patterns")
    .option("-s, --skip <dirs...>", "directory names (or root-relative paths) to skip")
    .option("-e, --ext <suffixes...>", "capture files whose name ends with a suffix")
    .option("-n, --name <names...>", "capture files whose name is exactly one of these")
    .option("-t, --top <n>", "size of the top files list", parseTop)
    .option("--no-summary", "omit the introduction and metrics sections")
    .option("--no-tree", "omit the repository structure section")
    .option("--log-file <file>", "log file path")
    .option("-v, --verbose", "enable verbose logging")
    .action(async (root: string | undefined, opts: ProgramOptions, command: Command) => {
      const fromCli = (key: string) => command.getOptionValueSource(key) === "cli";

      const { config, configDir } = await readConfig(fsAdapter, opts.config, cwd);
      const flags: CliFlags = {
        root,
        output: opts.output,
        ignoreFile: opts.ignoreFile,
        gitignore: fromCli("gitignore") ? opts.gitignore : undefined,
        defaultIgnores: opts.defaultIgnores,
        ignore: opts.ignore,
        skip: opts.skip,
        ext: opts.ext,
        name: opts.name,
        top: opts.top,
        summary: fromCli("summary") ? opts.summary : undefined,
        tree: fromCli("tree") ? opts.tree : undefined,
        logFile: opts.logFile,
      };

      const { options, logFilePath } = resolveOptions(flags, config, configDir, cwd);
      const container = createContainer(fsAdapter, logFilePath, opts.verbose ?? false);
      const result = await container.aggregateUseCase.execute(options);
      if (!result.ok) {
        process.exitCode = result.exitCode;
      }
    });

  return program;
}

async function readConfig(
  fsAdapter: FsAdapter,
  explicitPath: string | undefined,
  cwd: string
): Promise<{ config?: RepoDigestConfig; configDir: string }> {
  if (explicitPath !== undefined) {
    const configPath = path.resolve(cwd, explicitPath);
    return {
      config: await loadConfigFile(fsAdapter, configPath),
      configDir: path.dirname(configPath),
    };
  }
  const defaultPath = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  if (await fsAdapter.exists(defaultPath)) {
    return { config: await loadConfigFile(fsAdapter, defaultPath), configDir: cwd };
  }
  return { configDir: cwd };
}

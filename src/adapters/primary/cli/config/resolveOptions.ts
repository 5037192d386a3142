import * as path from "path";
import { AggregateOptions } from "../../../../application/ports/driving/AggregateOptions";
import {
  FileTypeRule,
  exactRule,
  suffixRule,
} from "../../../../domain/model/FileTypeRule";
import { FileTypeRuleConfig, RepoDigestConfig } from "./ConfigSchema";
import { DEFAULTS } from "./defaults";

/** Flags de línea de comandos; solo están presentes los que el usuario indicó */
export interface CliFlags {
  root?: string;
  output?: string;
  ignoreFile?: string;
  gitignore?: boolean;
  defaultIgnores?: boolean;
  ignore?: string[];
  skip?: string[];
  ext?: string[];
  name?: string[];
  top?: number;
  summary?: boolean;
  tree?: boolean;
  logFile?: string;
}

export interface ResolvedRun {
  options: AggregateOptions;
  logFilePath: string;
}

export function toFileTypeRule(config: FileTypeRuleConfig): FileTypeRule {
  return config.match_type === "endswith"
    ? suffixRule(config.match)
    : exactRule(config.match);
}

/**
 * Combina flags > archivo de configuración > valores por defecto.
 * Las rutas del archivo se resuelven desde `configDir`, las de los flags desde `cwd`.
 */
export function resolveOptions(
  flags: CliFlags,
  fileConfig: RepoDigestConfig | undefined,
  configDir: string,
  cwd: string
): ResolvedRun {
  const config = fileConfig ?? {};
  const fromFlag = (p: string) => path.resolve(cwd, p);
  const fromConfig = (p: string) => path.resolve(configDir, p);
  const pick = (
    flag: string | undefined,
    configured: string | undefined,
    fallback: string
  ) =>
    flag !== undefined
      ? fromFlag(flag)
      : configured !== undefined
        ? fromConfig(configured)
        : fromFlag(fallback);

  const rootPath = pick(flags.root, config.root, DEFAULTS.root);
  const outputPath = pick(flags.output, config.output, DEFAULTS.output);
  const logFilePath = pick(flags.logFile, config.logFile, DEFAULTS.logFile);

  let ignoreFilePath: string | undefined;
  if (flags.ignoreFile !== undefined) {
    ignoreFilePath = fromFlag(flags.ignoreFile);
  } else if (config.ignoreFile !== undefined) {
    ignoreFilePath = fromConfig(config.ignoreFile);
  }

  const ruleFlags = [
    ...(flags.ext ?? []).map(suffixRule),
    ...(flags.name ?? []).map(exactRule),
  ];
  const fileTypeRules =
    ruleFlags.length > 0
      ? ruleFlags
      : (config.fileTypes ?? []).map(toFileTypeRule);

  const options: AggregateOptions = {
    rootPath,
    outputPath,
    ignoreFilePath,
    includeGitIgnore: flags.gitignore ?? config.includeGitIgnore ?? true,
    includeDefaultPatterns:
      flags.defaultIgnores ?? config.includeDefaultPatterns ?? false,
    customIgnorePatterns: flags.ignore ?? config.customIgnorePatterns ?? [],
    directoriesToSkip: flags.skip ??
      config.directoriesToSkip ?? [...DEFAULTS.directoriesToSkip],
    fileTypeRules,
    topN: flags.top ?? config.topN ?? DEFAULTS.topN,
    includeSummary: flags.summary ?? config.includeSummary ?? true,
    includeTree: flags.tree ?? config.includeTree ?? true,
    excludePaths: [logFilePath],
  };
  return { options, logFilePath };
}

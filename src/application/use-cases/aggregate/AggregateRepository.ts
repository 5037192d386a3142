import * as path from "path";
import { AggregateUseCase } from "../../ports/driving/AggregateUseCase";
import { AggregateOptions } from "../../ports/driving/AggregateOptions";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { IgnoreSourcePort } from "../../ports/driven/IgnoreSourcePort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { TokenCounterPort } from "../../ports/driven/TokenCounterPort";
import { ConsoleProgressReporter } from "../../../adapters/secondary/reporting/ConsoleProgressReporter";
import {
  AggregateResult,
  SkippedFile,
} from "../../../domain/model/AggregateResult";
import { FileRecord } from "../../../domain/model/FileRecord";
import { describeRule } from "../../../domain/model/FileTypeRule";
import { FileFilter } from "../../services/filter/FileFilter";
import { RepositoryWalker } from "../../services/traversal/RepositoryWalker";
import { MetricsCalculator } from "../../services/metrics/MetricsCalculator";
import { formatSummary } from "../../services/metrics/SummaryFormatter";
import { FileLoaderService } from "./services/FileLoaderService";
import { OutputComposer } from "./services/OutputComposer";
import { ConfigError, errorMessage, exitCodeFor } from "../../../shared/errors";
import { rel } from "../../../shared/utils/pathUtils";

/**
 * Recorre el repositorio, filtra, lee cada archivo y escribe el documento
 * combinado junto con sus métricas. Una sola pasada secuencial.
 */
export class AggregateRepository implements AggregateUseCase {
  private readonly logger: ProgressReporter;
  private readonly walker: RepositoryWalker;
  private readonly loader: FileLoaderService;
  private readonly composer: OutputComposer;
  private readonly calculator = new MetricsCalculator();

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly ignoreSource: IgnoreSourcePort,
    private readonly tokenCounter: TokenCounterPort,
    logger?: ProgressReporter
  ) {
    this.logger = logger ?? new ConsoleProgressReporter(false, false);
    this.walker = new RepositoryWalker(this.fsPort, this.logger);
    this.loader = new FileLoaderService(
      this.fsPort,
      this.tokenCounter,
      this.logger
    );
    this.composer = new OutputComposer(this.logger, this.fsPort);
  }

  async execute(options: AggregateOptions): Promise<AggregateResult> {
    this.logger.startOperation("AggregateRepository.execute");
    this.logger.info(`🚀 Aggregating repository: ${options.rootPath}`);

    try {
      await this.assertRootDirectory(options.rootPath);
      const filter = new FileFilter({
        directoriesToSkip: options.directoriesToSkip,
        fileTypeRules: options.fileTypeRules,
        ignorePatterns: await this.buildIgnorePatterns(options),
        excludedFiles: this.excludedFiles(options),
      });
      if (!filter.hasFileTypeRules) {
        this.logger.warn(
          "AggregateRepository: No file type rules configured, no file will be captured."
        );
      } else {
        this.logger.debug(
          `🔍 File type rules: ${options.fileTypeRules.map(describeRule).join(", ")}`
        );
      }

      const records: FileRecord[] = [];
      const skipped: SkippedFile[] = [];
      for await (const file of this.walker.walk(options.rootPath, filter)) {
        const outcome = await this.loader.load(file);
        if (outcome.ok) {
          records.push(outcome.record);
        } else {
          skipped.push(outcome.skipped);
        }
      }
      this.logger.info(
        `AggregateRepository: Loaded ${records.length} files, skipped ${skipped.length}.`
      );

      const metrics = this.calculator.compute(records, options.topN);
      const content = this.composer.compose(records, metrics, options);
      await this.composer.write(options.outputPath, content);

      const outputTokens = this.tokenCounter.count(content);
      for (const line of formatSummary({
        outputPath: options.outputPath,
        metrics,
        outputTokens,
        skippedCount: skipped.length,
        encodingName: this.tokenCounter.encodingName,
      })) {
        this.logger.info(line);
      }

      this.logger.info("🎉 AggregateRepository: Aggregation completed successfully.");
      return { ok: true, content, metrics, outputTokens, skipped };
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.error(
        `❌ AggregateRepository: Aggregation failed: ${message}`,
        err instanceof Error ? err.stack : undefined
      );
      return { ok: false, error: message, exitCode: exitCodeFor(err) };
    } finally {
      this.logger.endOperation("AggregateRepository.execute");
    }
  }

  private async assertRootDirectory(rootPath: string): Promise<void> {
    const stats = await this.fsPort.stat(rootPath);
    if (!stats) {
      throw new ConfigError(
        `Root path does not exist or is not accessible: ${rootPath}`
      );
    }
    if (!stats.isDirectory) {
      throw new ConfigError(`Root path is not a directory: ${rootPath}`);
    }
  }

  private async buildIgnorePatterns(
    options: AggregateOptions
  ): Promise<string[]> {
    const patterns: string[] = [];
    if (options.includeDefaultPatterns) {
      patterns.push(...FileFilter.getDefaultIgnorePatterns());
    }
    if (options.ignoreFilePath) {
      patterns.push(
        ...(await this.ignoreSource.readPatterns(options.ignoreFilePath))
      );
    } else if (options.includeGitIgnore) {
      patterns.push(
        ...(await this.ignoreSource.getGitIgnorePatterns(options.rootPath))
      );
    }
    patterns.push(...options.customIgnorePatterns);
    this.logger.debug(`🔍 ${patterns.length} ignore patterns in effect`);
    return patterns;
  }

  /** Salida y archivos extra que caen dentro de la raíz */
  private excludedFiles(options: AggregateOptions): string[] {
    return [options.outputPath, ...(options.excludePaths ?? [])]
      .map((p) => rel(options.rootPath, path.resolve(p)))
      .filter(
        (p) =>
          p !== "" && p !== ".." && !p.startsWith("../") && !path.isAbsolute(p)
      );
  }
}

import { FsAdapter } from "../../../secondary/fs/FsAdapter";
import { IgnoreFileAdapter } from "../../../secondary/ignore/IgnoreFileAdapter";
import { TiktokenCounter } from "../../../secondary/tokenizer/TiktokenCounter";
import { ConsoleProgressReporter } from "../../../secondary/reporting/ConsoleProgressReporter";
import { FileLogReporter } from "../../../secondary/reporting/FileLogReporter";
import { CompositeProgressReporter } from "../../../secondary/reporting/CompositeProgressReporter";
import { AggregateRepository } from "../../../../application/use-cases/aggregate/AggregateRepository";
import { AggregateUseCase } from "../../../../application/ports/driving/AggregateUseCase";
import { ProgressReporter } from "../../../../application/ports/driven/ProgressReporter";

export interface Container {
  logger: ProgressReporter;
  aggregateUseCase: AggregateUseCase;
}

export function createContainer(
  fsAdapter: FsAdapter,
  logFilePath: string,
  verboseLogging: boolean = false
): Container {
  const logger = new CompositeProgressReporter(
    new ConsoleProgressReporter(verboseLogging, true),
    new FileLogReporter(logFilePath, verboseLogging)
  );

  const aggregateUseCase = new AggregateRepository(
    fsAdapter,
    new IgnoreFileAdapter(fsAdapter),
    new TiktokenCounter(),
    logger
  );

  return { logger, aggregateUseCase };
}

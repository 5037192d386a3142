export { AggregateRepository } from "./application/use-cases/aggregate/AggregateRepository";
export type { AggregateOptions } from "./application/ports/driving/AggregateOptions";
export type { AggregateUseCase } from "./application/ports/driving/AggregateUseCase";
export type { FileSystemPort } from "./application/ports/driven/FileSystemPort";
export type { IgnoreSourcePort } from "./application/ports/driven/IgnoreSourcePort";
export type { ProgressReporter } from "./application/ports/driven/ProgressReporter";
export type { TokenCounterPort } from "./application/ports/driven/TokenCounterPort";
export type { AggregateResult, SkippedFile } from "./domain/model/AggregateResult";
export type { FileRecord } from "./domain/model/FileRecord";
export type { RepositoryMetrics } from "./domain/model/RepositoryMetrics";
export type { FileTypeRule } from "./domain/model/FileTypeRule";
export {
  exactRule,
  suffixRule,
  matchesAnyRule,
} from "./domain/model/FileTypeRule";
export { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
export { IgnoreFileAdapter } from "./adapters/secondary/ignore/IgnoreFileAdapter";
export { TiktokenCounter } from "./adapters/secondary/tokenizer/TiktokenCounter";
export { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";
export { FileLogReporter } from "./adapters/secondary/reporting/FileLogReporter";
export { CompositeProgressReporter } from "./adapters/secondary/reporting/CompositeProgressReporter";
export * from "./shared/errors";

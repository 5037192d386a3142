import { RepositoryMetrics } from "../../../domain/model/RepositoryMetrics";

export interface SummaryInput {
  outputPath: string;
  metrics: RepositoryMetrics;
  outputTokens: number;
  skippedCount: number;
  encodingName: string;
}

/** Resumen legible para terminal y log */
export function formatSummary(input: SummaryInput): string[] {
  const { metrics } = input;
  const lines = [
    `Files included: ${metrics.totalFiles}`,
    `Files skipped (read/decode errors): ${input.skippedCount}`,
    `Total bytes: ${metrics.totalBytes}`,
    `Total tokens (sum of files): ${metrics.totalTokens}`,
    `Total tokens in the output file '${input.outputPath}' (${input.encodingName}): ${input.outputTokens}`,
  ];
  if (metrics.topFiles.length > 0) {
    lines.push(`Top ${metrics.topFiles.length} files by tokens:`);
    metrics.topFiles.forEach((entry, i) => {
      lines.push(`  ${i + 1}. ${entry.path}: ${entry.tokens} tokens`);
    });
  }
  return lines;
}

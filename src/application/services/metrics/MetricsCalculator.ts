import { FileRecord } from "../../../domain/model/FileRecord";
import {
  FileTypeMetrics,
  RepositoryMetrics,
  TopFileEntry,
} from "../../../domain/model/RepositoryMetrics";
import { fileExtension } from "../../../shared/utils/pathUtils";
import { compareOrdinal } from "../../../shared/utils/sortUtils";

export class MetricsCalculator {
  compute(records: readonly FileRecord[], topN: number): RepositoryMetrics {
    const byType = new Map<string, FileTypeMetrics>();
    let totalBytes = 0;
    let totalTokens = 0;

    for (const record of records) {
      totalBytes += record.bytes;
      totalTokens += record.tokens;
      const name = record.path.slice(record.path.lastIndexOf("/") + 1);
      const type = fileExtension(name);
      const entry = byType.get(type) ?? { count: 0, tokens: 0 };
      entry.count++;
      entry.tokens += record.tokens;
      byType.set(type, entry);
    }

    return {
      totalFiles: records.length,
      totalBytes,
      totalTokens,
      byType,
      topFiles: this.topFiles(records, topN),
    };
  }

  /** Descendente por tokens; a igualdad, por ruta */
  topFiles(records: readonly FileRecord[], topN: number): TopFileEntry[] {
    if (topN <= 0) return [];
    return records
      .map(({ path, tokens }) => ({ path, tokens }))
      .sort((a, b) => b.tokens - a.tokens || compareOrdinal(a.path, b.path))
      .slice(0, topN);
  }
}

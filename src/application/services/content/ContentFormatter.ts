import { RepositoryMetrics } from "../../../domain/model/RepositoryMetrics";

const BANNER_LINE = "=".repeat(64);

/**
 * Servicio para formatear las secciones del documento combinado
 */
export class ContentFormatter {
  public static readonly SECTION_OPEN = "=== ";
  public static readonly SECTION_CLOSE = " ===";

  /** `=== <ruta> ===`, contenido y una línea en blanco */
  formatFileSection(path: string, content: string): string {
    return `${ContentFormatter.SECTION_OPEN}${path}${ContentFormatter.SECTION_CLOSE}\n${content}\n\n`;
  }

  formatBanner(title: string): string {
    return `${BANNER_LINE}\n${title}\n${BANNER_LINE}\n\n`;
  }

  generateIntroduction(includeTree: boolean): string {
    const parts = [
      "This file is a merged representation of a repository, combining the selected files into a single document.",
      "It is meant to be consumed by AI systems for analysis, code review or other automated processes.",
      "",
      "Layout:",
      "1. This introduction",
      "2. Repository metrics",
    ];
    if (includeTree) {
      parts.push("3. Repository structure");
    }
    parts.push(
      `${includeTree ? 4 : 3}. One entry per file: a "=== path/to/file ===" line, the file contents and a blank line`
    );
    return this.formatBanner("File Summary") + parts.join("\n") + "\n\n";
  }

  formatMetrics(metrics: RepositoryMetrics, topN: number): string {
    const lines = [
      `Total Files: ${metrics.totalFiles}`,
      `Total Bytes: ${metrics.totalBytes}`,
      `Total Tokens: ${metrics.totalTokens}`,
      "Total Files by Type:",
    ];
    for (const [type, entry] of metrics.byType) {
      lines.push(`    - ${type}: ${entry.count} (${entry.tokens} tokens)`);
    }
    lines.push("", `Top ${topN} Files by Tokens:`);
    for (const top of metrics.topFiles) {
      lines.push(`    - ${top.path}: ${top.tokens} tokens`);
    }
    return this.formatBanner("Repository Metrics") + lines.join("\n") + "\n\n";
  }

  formatStructure(treeText: string): string {
    return this.formatBanner("Repository Structure") + treeText + "\n";
  }
}

import * as path from "path";
import { FileRecord } from "../../../../domain/model/FileRecord";
import { RepositoryMetrics } from "../../../../domain/model/RepositoryMetrics";
import { ContentFormatter } from "../../../services/content/ContentFormatter";
import { TreeFormatter } from "../../../services/tree/TreeFormatter";
import { AggregateOptions } from "../../../ports/driving/AggregateOptions";
import { FileSystemPort } from "../../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";

export class OutputComposer {
  private readonly formatter = new ContentFormatter();
  private readonly treeFormatter = new TreeFormatter();

  constructor(
    private readonly logger: ProgressReporter,
    private readonly fsPort: FileSystemPort
  ) {}

  compose(
    records: readonly FileRecord[],
    metrics: RepositoryMetrics,
    options: AggregateOptions
  ): string {
    this.logger.startOperation("OutputComposer.compose");

    let preamble = "";
    if (options.includeSummary) {
      preamble += this.formatter.generateIntroduction(options.includeTree);
      preamble += this.formatter.formatMetrics(metrics, options.topN);
    }
    if (options.includeTree) {
      const tree = this.treeFormatter.buildTree(
        path.basename(options.rootPath),
        records.map((r) => r.path)
      );
      preamble += this.formatter.formatStructure(
        this.treeFormatter.formatTree(tree)
      );
    }
    if (preamble) {
      preamble += this.formatter.formatBanner("Repository Files");
    }

    const sections = records.map((record) =>
      this.formatter.formatFileSection(record.path, record.content)
    );

    this.logger.endOperation("OutputComposer.compose");
    return preamble + sections.join("");
  }

  /** @throws OutputWriteError */
  async write(outputPath: string, content: string): Promise<void> {
    this.logger.info(`OutputComposer.write: Writing to ${outputPath}`);
    await this.fsPort.writeFile(outputPath, content);
    this.logger.info(
      `OutputComposer.write: Combined document generated successfully at ${outputPath}`
    );
  }
}

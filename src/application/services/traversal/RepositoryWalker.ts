import * as path from "path";
import {
  FileSystemPort,
  PortDirectoryEntry,
} from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { FileFilter } from "../filter/FileFilter";
import { compareOrdinal } from "../../../shared/utils/sortUtils";
import { errorMessage } from "../../../shared/errors";

export interface WalkedFile {
  /** Ruta relativa a la raíz con "/" */
  path: string;
  absolutePath: string;
}

type EntryKind = "directory" | "file" | "other";

interface ClassifiedEntry {
  name: string;
  kind: EntryKind;
}

/**
 * Recorre el árbol de arriba hacia abajo y produce, de forma perezosa, los
 * archivos que pasan el filtro. Dentro de cada directorio se visitan primero
 * los subdirectorios y luego los archivos, ambos por orden de nombre.
 */
export class RepositoryWalker {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly logger: ProgressReporter
  ) {}

  walk(rootPath: string, filter: FileFilter): AsyncGenerator<WalkedFile> {
    return this.walkDirectory(rootPath, "", filter);
  }

  private async *walkDirectory(
    absoluteDir: string,
    relativeDir: string,
    filter: FileFilter
  ): AsyncGenerator<WalkedFile> {
    let entries: PortDirectoryEntry[];
    try {
      entries = await this.fsPort.listDirectoryEntries(absoluteDir);
    } catch (error) {
      this.logger.error(
        `RepositoryWalker: Cannot list directory ${absoluteDir}: ${errorMessage(error)}`
      );
      return;
    }

    const classified: ClassifiedEntry[] = [];
    for (const entry of entries) {
      classified.push({
        name: entry.name,
        kind: await this.classify(entry, absoluteDir),
      });
    }

    const directories = classified
      .filter((e) => e.kind === "directory")
      .sort((a, b) => compareOrdinal(a.name, b.name));
    const files = classified
      .filter((e) => e.kind === "file")
      .sort((a, b) => compareOrdinal(a.name, b.name));

    for (const dir of directories) {
      const childRel = joinRelative(relativeDir, dir.name);
      if (!filter.acceptsDirectory(childRel)) {
        this.logger.debug(`🔍 Skipping directory ${childRel}`);
        continue;
      }
      yield* this.walkDirectory(
        path.join(absoluteDir, dir.name),
        childRel,
        filter
      );
    }

    for (const file of files) {
      const childRel = joinRelative(relativeDir, file.name);
      if (!filter.acceptsFile(childRel)) continue;
      yield { path: childRel, absolutePath: path.join(absoluteDir, file.name) };
    }
  }

  /** Los enlaces simbólicos a archivos se leen; a directorios no se descienden. */
  private async classify(
    entry: PortDirectoryEntry,
    parentDir: string
  ): Promise<EntryKind> {
    if (entry.isDirectory()) return "directory";
    if (entry.isFile()) return "file";
    if (entry.isSymbolicLink()) {
      const target = await this.fsPort.stat(path.join(parentDir, entry.name));
      return target?.isFile ? "file" : "other";
    }
    return "other";
  }
}

function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

import ignore, { Ignore } from "ignore";
import {
  FileTypeRule,
  matchesAnyRule,
} from "../../../domain/model/FileTypeRule";
import { defaultIgnorePatterns } from "../../../shared/utils/ignorePatterns";
import { normalizeRelative } from "../../../shared/utils/pathUtils";

export interface FileFilterConfig {
  directoriesToSkip: readonly string[];
  fileTypeRules: readonly FileTypeRule[];
  ignorePatterns: readonly string[];
  /** Rutas relativas que nunca se incluyen (p. ej. el propio documento de salida) */
  excludedFiles?: readonly string[];
}

/**
 * Decide qué entradas del recorrido se descartan: lista de directorios a omitir,
 * patrones gitignore y reglas de tipo de archivo.
 */
export class FileFilter {
  private readonly skipNames = new Set<string>();
  private readonly skipPaths = new Set<string>();
  private readonly ignoreHandler: Ignore;
  private readonly rules: readonly FileTypeRule[];
  private readonly excludedFiles: Set<string>;

  constructor(config: FileFilterConfig) {
    for (const entry of config.directoriesToSkip) {
      const normalized = normalizeRelative(entry);
      if (!normalized) continue;
      if (normalized.includes("/")) {
        this.skipPaths.add(normalized);
      } else {
        this.skipNames.add(normalized);
      }
    }
    this.ignoreHandler = ignore().add([...config.ignorePatterns]);
    this.rules = config.fileTypeRules;
    this.excludedFiles = new Set(
      (config.excludedFiles ?? []).map(normalizeRelative)
    );
  }

  /**
   * Obtiene patrones de ignorado predeterminados para archivos binarios y comunes
   */
  static getDefaultIgnorePatterns(): string[] {
    return [...defaultIgnorePatterns];
  }

  get hasFileTypeRules(): boolean {
    return this.rules.length > 0;
  }

  /**
   * true si algún segmento de la ruta está en la lista de omitidos,
   * o si la ruta está bajo una ruta omitida.
   */
  isInSkippedDirectory(relativePath: string, isDirectory: boolean): boolean {
    const segments = relativePath.split("/");
    const dirSegments = isDirectory ? segments : segments.slice(0, -1);
    if (dirSegments.some((segment) => this.skipNames.has(segment))) {
      return true;
    }
    for (let i = 1; i <= dirSegments.length; i++) {
      if (this.skipPaths.has(dirSegments.slice(0, i).join("/"))) return true;
    }
    return false;
  }

  /** Rutas que `ignore` no acepta como relativas (p. ej. `...`) no se ignoran */
  isIgnored(relativePath: string, isDirectory: boolean): boolean {
    const candidate = isDirectory ? `${relativePath}/` : relativePath;
    return ignore.isPathValid(candidate) && this.ignoreHandler.ignores(candidate);
  }

  matchesFileType(fileName: string): boolean {
    return matchesAnyRule(fileName, this.rules);
  }

  acceptsDirectory(relativePath: string): boolean {
    return (
      !this.isInSkippedDirectory(relativePath, true) &&
      !this.isIgnored(relativePath, true)
    );
  }

  acceptsFile(relativePath: string): boolean {
    const fileName = relativePath.slice(relativePath.lastIndexOf("/") + 1);
    return (
      !this.excludedFiles.has(relativePath) &&
      !this.isInSkippedDirectory(relativePath, false) &&
      !this.isIgnored(relativePath, false) &&
      this.matchesFileType(fileName)
    );
  }
}

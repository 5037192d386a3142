import * as path from "path";
import { FileSystemPort } from "../../../application/ports/driven/FileSystemPort";
import { IgnoreSourcePort } from "../../../application/ports/driven/IgnoreSourcePort";
import { ConfigError, errorMessage } from "../../../shared/errors";
import { decodeUtf8 } from "../../../shared/utils/textDecoding";

/**
 * Lee archivos con sintaxis gitignore a través del puerto de sistema de archivos
 */
export class IgnoreFileAdapter implements IgnoreSourcePort {
  constructor(private readonly fsPort: FileSystemPort) {}

  async readPatterns(ignoreFilePath: string): Promise<string[]> {
    const stats = await this.fsPort.stat(ignoreFilePath);
    if (!stats || !stats.isFile) {
      throw new ConfigError(`Ignore file not found: ${ignoreFilePath}`);
    }
    try {
      const bytes = await this.fsPort.readBytes(ignoreFilePath);
      return parseIgnoreFile(decodeUtf8(bytes, ignoreFilePath));
    } catch (err) {
      throw new ConfigError(
        `Error parsing ignore file ${ignoreFilePath}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  async getGitIgnorePatterns(rootPath: string): Promise<string[]> {
    const gitignorePath = path.join(rootPath, ".gitignore");
    if (!(await this.fsPort.exists(gitignorePath))) {
      return [];
    }
    return this.readPatterns(gitignorePath);
  }
}

/**
 * Separa en líneas y descarta vacías y comentarios.
 * Los espacios finales se recortan salvo los escapados con "\".
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => (line.endsWith("\\ ") ? line : line.trimEnd()))
    .filter((line) => line.trim() !== "" && !line.startsWith("#"));
}

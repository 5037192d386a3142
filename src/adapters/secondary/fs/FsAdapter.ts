import * as fs from "fs";
import * as nodePath from "path";
import {
  FileSystemPort,
  PortDirectoryEntry,
  PortFileStats,
} from "../../../application/ports/driven/FileSystemPort";
import {
  OutputWriteError,
  ReadError,
  errorMessage,
} from "../../../shared/errors";

/**
 * Adaptador para el sistema de archivos
 */
export class FsAdapter implements FileSystemPort {
  async readBytes(filePath: string): Promise<Uint8Array> {
    try {
      // readFile abre y cierra el descriptor en todos los caminos
      return await fs.promises.readFile(filePath);
    } catch (err) {
      throw new ReadError(errorMessage(err), { cause: err });
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    try {
      await fs.promises.mkdir(nodePath.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, content, "utf-8");
    } catch (err) {
      throw new OutputWriteError(
        `Cannot write output file ${filePath}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  async exists(p: string): Promise<boolean> {
    try {
      await fs.promises.access(p);
      return true;
    } catch {
      return false;
    }
  }

  async stat(filePath: string): Promise<PortFileStats | null> {
    try {
      const stats = await fs.promises.stat(filePath);
      const linkStats = await fs.promises.lstat(filePath);
      return {
        size: stats.size,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        isSymbolicLink: linkStats.isSymbolicLink(),
      };
    } catch {
      return null;
    }
  }

  async listDirectoryEntries(dirPath: string): Promise<PortDirectoryEntry[]> {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      throw new ReadError(errorMessage(err), { cause: err });
    }
    return dirents.map((dirent) => ({
      name: dirent.name,
      isFile: () => dirent.isFile(),
      isDirectory: () => dirent.isDirectory(),
      isSymbolicLink: () => dirent.isSymbolicLink(),
    }));
  }
}

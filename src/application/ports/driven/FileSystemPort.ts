export interface PortDirectoryEntry {
  name: string;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export interface PortFileStats {
  size: number;
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

/**
 * Puerto secundario para interactuar con el sistema de archivos
 */
export interface FileSystemPort {
  /**
   * Lee el archivo completo.
   * @throws ReadError si no se puede abrir o leer
   */
  readBytes(path: string): Promise<Uint8Array>;

  /**
   * Escribe (o reemplaza) el archivo, creando los directorios intermedios.
   * @throws OutputWriteError si la escritura falla
   */
  writeFile(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  /**
   * Obtiene estadísticas de un archivo o directorio (siguiendo enlaces).
   * @returns null si no existe o hay error.
   */
  stat(path: string): Promise<PortFileStats | null>;

  /**
   * Lista las entradas de un directorio.
   * @throws ReadError si el directorio no se puede leer
   */
  listDirectoryEntries(dirPath: string): Promise<PortDirectoryEntry[]>;
}

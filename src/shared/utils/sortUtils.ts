import { FileTree } from "../../domain/model/FileTree";

/** Comparación ordinal, independiente del locale */
export function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Ordena directorios antes que archivos y, dentro de cada tipo, por nombre */
export function compareFileTrees(a: FileTree, b: FileTree): number {
  if (a.isDirectory === b.isDirectory) {
    return compareOrdinal(a.name, b.name);
  }
  return a.isDirectory ? -1 : 1;
}

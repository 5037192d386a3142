import { FileTree } from "../../../domain/model/FileTree";
import { compareFileTrees } from "../../../shared/utils/sortUtils";

/**
 * Servicio para construir y formatear la estructura de árbol de archivos
 */
export class TreeFormatter {
  /**
   * Construye el árbol a partir de rutas relativas con "/"
   * @param rootName Nombre del nodo raíz
   * @param paths Rutas de archivos incluidos
   */
  buildTree(rootName: string, paths: readonly string[]): FileTree {
    const root: FileTree = {
      path: "",
      name: rootName,
      isDirectory: true,
      children: [],
    };

    for (const filePath of paths) {
      const segments = filePath.split("/");
      let parent = root;
      segments.forEach((segment, index) => {
        const isLeaf = index === segments.length - 1;
        const nodePath = segments.slice(0, index + 1).join("/");
        const siblings = parent.children ?? (parent.children = []);
        let node = siblings.find(
          (c) => c.name === segment && c.isDirectory === !isLeaf
        );
        if (!node) {
          node = isLeaf
            ? { path: nodePath, name: segment, isDirectory: false }
            : { path: nodePath, name: segment, isDirectory: true, children: [] };
          siblings.push(node);
        }
        parent = node;
      });
    }
    return root;
  }

  /**
   * Formatea el árbol de archivos en formato de texto ASCII
   * @returns Representación de texto del árbol (sin la raíz)
   */
  formatTree(tree: FileTree): string {
    if (!tree.isDirectory || !tree.children || tree.children.length === 0) {
      return "";
    }
    return this.formatNode(tree, "");
  }

  private formatNode(node: FileTree, prefix: string): string {
    const children = [...(node.children ?? [])].sort(compareFileTrees);
    let result = "";
    children.forEach((child, index) => {
      const isLast = index === children.length - 1;
      result += `${prefix}${isLast ? "└── " : "├── "}${child.name}\n`;
      if (child.isDirectory) {
        result += this.formatNode(child, prefix + (isLast ? "    " : "│   "));
      }
    });
    return result;
  }
}

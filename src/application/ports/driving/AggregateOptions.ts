import { FileTypeRule } from "../../../domain/model/FileTypeRule";

/**
 * Opciones de una pasada de agregado. Se construyen una vez y no cambian.
 */
export interface AggregateOptions {
  /** Ruta raíz del repositorio a recorrer */
  readonly rootPath: string;

  /** Ruta del documento combinado */
  readonly outputPath: string;

  /** Archivo de ignorado explícito. Si se indica, debe existir. */
  readonly ignoreFilePath?: string;

  /** Sin archivo explícito: usar `<root>/.gitignore` si existe */
  readonly includeGitIgnore: boolean;

  /** Patrones de ignorado personalizados */
  readonly customIgnorePatterns: readonly string[];

  /** Incluir patrones por defecto para binarios, dependencias y builds */
  readonly includeDefaultPatterns: boolean;

  /**
   * Directorios a omitir. Un nombre simple aplica a cualquier nivel;
   * una ruta con "/" se interpreta relativa a la raíz.
   */
  readonly directoriesToSkip: readonly string[];

  /** Reglas de tipo de archivo (se combinan con OR) */
  readonly fileTypeRules: readonly FileTypeRule[];

  /** Tamaño de la lista de archivos con más tokens */
  readonly topN: number;

  /** Introducción y sección de métricas al inicio del documento */
  readonly includeSummary: boolean;

  /** Archivos que nunca se incluyen, como el log de la ejecución */
  readonly excludePaths?: readonly string[];

  /** Incluir estructura de árbol de los archivos incluidos */
  readonly includeTree: boolean;
}

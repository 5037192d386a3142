/**
 * Fuente de patrones con sintaxis gitignore
 */
export interface IgnoreSourcePort {
  /**
   * Lee los patrones de un archivo de ignorado.
   * Omite líneas vacías y comentarios.
   * @throws ConfigError si el archivo no existe o no se puede leer
   */
  readPatterns(ignoreFilePath: string): Promise<string[]>;

  /**
   * Patrones del `.gitignore` en la raíz, o [] si no hay.
   */
  getGitIgnorePatterns(rootPath: string): Promise<string[]>;
}

export interface FileTypeMetrics {
  count: number;
  tokens: number;
}

export interface TopFileEntry {
  path: string;
  tokens: number;
}

/**
 * Métricas agregadas de una pasada sobre el repositorio
 */
export interface RepositoryMetrics {
  totalFiles: number;
  totalBytes: number;

  /** Suma de los tokens de cada archivo. Es el total de referencia. */
  totalTokens: number;

  /** Agrupado por extensión (o nombre completo si no tiene) en orden de aparición */
  byType: Map<string, FileTypeMetrics>;

  /** Ordenado por tokens descendente, empates por ruta */
  topFiles: TopFileEntry[];
}

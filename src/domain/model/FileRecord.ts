/**
 * Archivo incluido en el documento combinado
 */
export interface FileRecord {
  /** Ruta relativa a la raíz, con separadores "/" */
  path: string;

  /** Contenido decodificado */
  content: string;

  /** Cantidad de tokens del contenido */
  tokens: number;

  /** Tamaño en bytes tal como está en disco */
  bytes: number;
}

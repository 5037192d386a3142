import { RepositoryMetrics } from "./RepositoryMetrics";

export interface SkippedFile {
  path: string;
  reason: string;
}

/**
 * Representa el resultado de la operación de agregado
 */
export type AggregateResult =
  | {
      ok: true;
      /** Documento combinado tal como se escribió */
      content: string;
      metrics: RepositoryMetrics;
      /** Tokens del documento completo (cabeceras y separadores incluidos) */
      outputTokens: number;
      skipped: SkippedFile[];
    }
  | {
      ok: false;
      error: string;
      /** 2 para errores de configuración, 1 para el resto */
      exitCode: 1 | 2;
    };

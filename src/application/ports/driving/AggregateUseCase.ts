import { AggregateOptions } from "./AggregateOptions";
import { AggregateResult } from "../../../domain/model/AggregateResult";

/**
 * Puerto primario (interfaz) para el caso de uso de agregado
 */
export interface AggregateUseCase {
  /**
   * Ejecuta el agregado según las opciones proporcionadas
   * @param options Opciones de agregado
   * @returns Resultado de la operación
   */
  execute(options: AggregateOptions): Promise<AggregateResult>;
}

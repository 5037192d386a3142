/**
 * Contador de tokens. Debe ser una función pura: mismo texto, mismo resultado.
 */
export interface TokenCounterPort {
  readonly encodingName: string;
  count(text: string): number;
}

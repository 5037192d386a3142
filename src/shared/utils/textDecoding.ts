import { DecodeError } from "../errors";

/**
 * Decodifica bytes como UTF-8 estricto (el BOM inicial se descarta).
 * Lanza DecodeError si la secuencia no es válida.
 */
export function decodeUtf8(bytes: Uint8Array, label: string): string {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new DecodeError(`Invalid UTF-8 content in ${label}`, {
      cause: error,
    });
  }
}

import { getEncoding, Tiktoken, TiktokenEncoding } from "js-tiktoken";
import { TokenCounterPort } from "../../../application/ports/driven/TokenCounterPort";

/**
 * Cuenta tokens con una codificación BPE de tiktoken (cl100k_base por defecto).
 * El texto de tokens especiales se cuenta como texto normal.
 */
export class TiktokenCounter implements TokenCounterPort {
  private readonly encoding: Tiktoken;

  constructor(readonly encodingName: TiktokenEncoding = "cl100k_base") {
    this.encoding = getEncoding(encodingName);
  }

  count(text: string): number {
    if (text.length === 0) return 0;
    return this.encoding.encode(text, [], []).length;
  }
}

import { FileSystemPort } from "../../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { TokenCounterPort } from "../../../ports/driven/TokenCounterPort";
import { FileRecord } from "../../../../domain/model/FileRecord";
import { SkippedFile } from "../../../../domain/model/AggregateResult";
import { WalkedFile } from "../../../services/traversal/RepositoryWalker";
import {
  convertNotebook,
  isNotebook,
} from "../../../services/content/NotebookConverter";
import { decodeUtf8 } from "../../../../shared/utils/textDecoding";
import { DecodeError, errorMessage } from "../../../../shared/errors";

export type LoadOutcome =
  | { ok: true; record: FileRecord }
  | { ok: false; skipped: SkippedFile };

/**
 * Lee un archivo completo, lo decodifica y cuenta sus tokens.
 * Los errores de lectura o decodificación se registran y el archivo se omite.
 * Los notebooks `.ipynb` se convierten a script antes de contar tokens.
 */
export class FileLoaderService {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly tokenCounter: TokenCounterPort,
    private readonly logger: ProgressReporter
  ) {}

  async load(file: WalkedFile): Promise<LoadOutcome> {
    let bytes: Uint8Array;
    try {
      bytes = await this.fsPort.readBytes(file.absolutePath);
    } catch (error) {
      const reason = `Error reading file ${file.path}: ${errorMessage(error)}`;
      this.logger.error(`FileLoaderService.load: ${reason}`);
      return { ok: false, skipped: { path: file.path, reason } };
    }

    let content: string;
    try {
      content = decodeUtf8(bytes, file.path);
    } catch (error) {
      const reason =
        error instanceof DecodeError
          ? `Encoding error in file ${file.path}: ${error.message}`
          : `Error decoding file ${file.path}: ${errorMessage(error)}`;
      this.logger.error(`FileLoaderService.load: ${reason}`);
      return { ok: false, skipped: { path: file.path, reason } };
    }

    if (isNotebook(file.path)) {
      content = this.notebookToScript(file.path, content);
    }

    const record: FileRecord = {
      path: file.path,
      content,
      tokens: this.tokenCounter.count(content),
      bytes: bytes.byteLength,
    };
    this.logger.debug(
      `🔍 Loaded ${record.path} (${record.bytes} bytes, ${record.tokens} tokens)`
    );
    return { ok: true, record };
  }

  /** Si el notebook no se puede interpretar se conserva el contenido original */
  private notebookToScript(filePath: string, raw: string): string {
    const conversion = convertNotebook(raw);
    if (conversion.ok) return conversion.script;
    this.logger.error(
      `FileLoaderService.load: Error converting notebook ${filePath}: ${conversion.error}`
    );
    return raw;
  }
}

import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

/**
 * Implementación de ProgressReporter que usa console y puede añadir prefijos de nivel.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private readonly verbose: boolean;
  private readonly addLevelPrefixes: boolean;

  /**
   * @param verbose Si es true, muestra debug y los tiempos de cada operación.
   * @param addLevelPrefixes Si es true, añade prefijos [INFO], [WARN], etc. a los mensajes.
   */
  constructor(verbose: boolean = false, addLevelPrefixes: boolean = false) {
    this.verbose = verbose;
    this.addLevelPrefixes = addLevelPrefixes;
  }

  startOperation(label: string): void {
    if (this.verbose) console.time(label);
  }

  endOperation(label: string): void {
    if (this.verbose) console.timeEnd(label);
  }

  info(message: string): void {
    const prefix = this.addLevelPrefixes ? "[INFO] " : "";
    console.log(`${prefix}${message}`);
  }

  warn(message: string): void {
    const prefix = this.addLevelPrefixes ? "[WARN] " : "";
    console.warn(`${prefix}${message}`);
  }

  error(message: string, error?: unknown): void {
    const prefix = this.addLevelPrefixes ? "[ERROR] " : "";
    if (this.verbose && error !== undefined) {
      console.error(`${prefix}${message}`, error);
    } else {
      console.error(`${prefix}${message}`);
    }
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    if (this.verbose) {
      const prefix = this.addLevelPrefixes ? "[DEBUG] " : "";
      console.debug(`${prefix}${message}`, ...optionalParams);
    }
  }
}

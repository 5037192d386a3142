import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

/** Reenvía cada llamada a todos los reporters */
export class CompositeProgressReporter implements ProgressReporter {
  private readonly reporters: readonly ProgressReporter[];

  constructor(...reporters: ProgressReporter[]) {
    this.reporters = reporters;
  }

  startOperation(label: string): void {
    this.reporters.forEach((r) => r.startOperation(label));
  }

  endOperation(label: string): void {
    this.reporters.forEach((r) => r.endOperation(label));
  }

  info(message: string): void {
    this.reporters.forEach((r) => r.info(message));
  }

  warn(message: string): void {
    this.reporters.forEach((r) => r.warn(message));
  }

  error(message: string, error?: unknown): void {
    this.reporters.forEach((r) => r.error(message, error));
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    this.reporters.forEach((r) => r.debug(message, ...optionalParams));
  }
}

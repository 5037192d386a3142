import * as fs from "fs";
import * as path from "path";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

type Level = "DEBUG" | "INFO" | "WARNING" | "ERROR";

/**
 * Escribe cada mensaje como `timestamp - NIVEL - mensaje` en un archivo de log.
 * El archivo se trunca al crear el reporter.
 */
export class FileLogReporter implements ProgressReporter {
  private readonly startedAt = new Map<string, number>();

  constructor(
    private readonly logFilePath: string,
    private readonly includeDebug: boolean = false,
    private readonly now: () => Date = () => new Date()
  ) {
    fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
    fs.writeFileSync(logFilePath, "", "utf-8");
  }

  startOperation(label: string): void {
    this.startedAt.set(label, this.now().getTime());
  }

  endOperation(label: string): void {
    const start = this.startedAt.get(label);
    if (start === undefined) return;
    this.startedAt.delete(label);
    if (this.includeDebug) {
      this.write("DEBUG", `${label}: ${this.now().getTime() - start}ms`);
    }
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARNING", message);
  }

  error(message: string, error?: unknown): void {
    this.write("ERROR", message);
    if (this.includeDebug && typeof error === "string" && error) {
      this.write("DEBUG", error);
    }
  }

  debug(message: string): void {
    if (this.includeDebug) this.write("DEBUG", message);
  }

  private write(level: Level, message: string): void {
    fs.appendFileSync(
      this.logFilePath,
      `${this.now().toISOString()} - ${level} - ${message}\n`,
      "utf-8"
    );
  }
}

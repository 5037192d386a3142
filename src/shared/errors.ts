/**
 * Códigos de error de la aplicación.
 * Los errores de configuración se corrigen desde el lado del usuario (exit code 2).
 */
export type ErrorCode =
  | "ConfigError"
  | "ReadError"
  | "DecodeError"
  | "OutputWriteError"
  | "UnknownError";

export interface AppErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown> | string;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/** Raíz inexistente, archivo de ignorado ausente, configuración inválida */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/** El archivo no se pudo leer (permisos, borrado durante el recorrido) */
export class ReadError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ReadError", message, options);
  }
}

/** El contenido no es UTF-8 válido */
export class DecodeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("DecodeError", message, options);
  }
}

export class OutputWriteError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("OutputWriteError", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): 1 | 2 {
  return error instanceof ConfigError ? 2 : 1;
}

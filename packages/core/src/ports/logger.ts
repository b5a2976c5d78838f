/**
 * Structured logger port.
 *
 * Each method takes a context object followed by a message, or just a
 * message, matching pino's call signature so adapters stay thin.
 */
export interface Logger {
    trace(obj: Record<string, unknown>, msg?: string): void;
    trace(msg: string): void;
    debug(obj: Record<string, unknown>, msg?: string): void;
    debug(msg: string): void;
    info(obj: Record<string, unknown>, msg?: string): void;
    info(msg: string): void;
    warn(obj: Record<string, unknown>, msg?: string): void;
    warn(msg: string): void;
    error(obj: Record<string, unknown>, msg?: string): void;
    error(msg: string): void;
    fatal(obj: Record<string, unknown>, msg?: string): void;
    fatal(msg: string): void;

    child(bindings: Record<string, unknown>): Logger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

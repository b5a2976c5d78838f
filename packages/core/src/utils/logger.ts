import { type Logger } from '../ports/logger';

/** A logger that drops everything; the default wherever none is injected. */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  const logger: Logger = {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger
  };
  return logger;
}

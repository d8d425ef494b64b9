export interface Logger {
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

export interface LoggerOptions {
  /** Drops `info` output; warnings and errors still print. */
  quiet?: boolean;
}

function emit(
  write: (...args: unknown[]) => void,
  tag: string,
  message: string,
  details: unknown
): void {
  if (details === undefined) {
    write(`[${tag}] ${message}`);
  } else {
    write(`[${tag}] ${message}`, details);
  }
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  return {
    info(message, details) {
      if (!options.quiet) {
        emit(console.info, tag, message, details);
      }
    },
    warn(message, details) {
      emit(console.warn, tag, message, details);
    },
    error(message, details) {
      emit(console.error, tag, message, details);
    }
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {}
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

interface ConsoleLoggerOptions {
  quiet: boolean;
  stream?: NodeJS.WritableStream;
}

/** Diagnostics go to stderr so stdout stays clean for the transcript. */
export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const stream = options.stream ?? process.stderr;
  const write = (level: string, message: string) => stream.write(`[${level}] ${message}\n`);
  return {
    info: (message) => {
      if (!options.quiet) write("info", message);
    },
    warn: (message) => write("warn", message),
    error: (message) => write("error", message)
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

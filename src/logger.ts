/**
 * Console logger based on verbosity settings
 */

export interface Logger {
  log(message: string): void;
  verbose(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Write without a newline, for carriage-return progress updates */
  progress(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const isQuiet = options.quiet ?? false;
  const isVerbose = options.verbose ?? false;

  return {
    log: (message: string) => {
      if (!isQuiet) console.log(message);
    },
    verbose: (message: string) => {
      if (isVerbose && !isQuiet) console.log(message);
    },
    warn: (message: string) => {
      console.warn(`  ⚠ ${message}`);
    },
    error: (message: string) => {
      console.error(message);
    },
    progress: (message: string) => {
      if (!isQuiet) process.stdout.write(message);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  log: () => {},
  verbose: () => {},
  warn: () => {},
  error: () => {},
  progress: () => {},
};

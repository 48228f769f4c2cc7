import pc from 'picocolors';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export type LoggerOptions = {
  quiet?: boolean;
  verbose?: boolean;
};

export function createLogger({ quiet = false, verbose = false }: LoggerOptions = {}): Logger {
  return {
    info: message => {
      if (!quiet) console.log(message);
    },
    success: message => {
      if (!quiet) console.log(pc.green(message));
    },
    // Problems are always printed, even when quiet.
    warn: message => console.error(pc.yellow(message)),
    error: message => console.error(pc.red(message)),
    debug: message => {
      if (verbose && !quiet) console.log(pc.dim(message));
    },
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Console logger; `quiet` drops progress lines but keeps warnings and errors. */
export function createLogger(opts: { quiet?: boolean } = {}): Logger {
  return {
    info: (message) => {
      if (!opts.quiet) console.log(message);
    },
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Invalid flags, environment or catalog data. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A report file could not be written. */
export class OutputWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

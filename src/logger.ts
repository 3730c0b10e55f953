// program name printed in front of every message
export const PKG_NAME = "pyscript-kernel-shim";

/**
 * Verbosity levels:
 *  1 - configuration and discovery results
 *  2 - every discovery request
 *  3 - relay connection lifecycle
 *  4 - payload dumps
 */
export class Logger {
  constructor(
    readonly verbose: number = 0,
    private readonly write: (line: string) => void = (line) =>
      console.log(line)
  ) {}

  enabled(level: number) {
    return this.verbose >= level;
  }

  log(level: number, message: string) {
    if (this.enabled(level)) {
      this.write(`${PKG_NAME}: ${message}`);
    }
  }

  error(message: string) {
    this.write(`${PKG_NAME}: ${message}`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function stackOf(err: unknown): string {
  if (err instanceof Error && err.stack) {
    return err.stack;
  }
  return describeError(err);
}

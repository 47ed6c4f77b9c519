// ---------------------------------------------------------------------------
// Bootstrap errors
// ---------------------------------------------------------------------------

export type BootstrapErrorOptions = {
  step?: string;
  exitCode?: number;
  cause?: unknown;
};

/** Fatal condition: the boot sequence stops before hand-off. */
export class BootstrapError extends Error {
  readonly step: string | undefined;
  readonly exitCode: number;

  constructor(message: string, opts: BootstrapErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "BootstrapError";
    this.step = opts.step;
    this.exitCode = opts.exitCode ?? 1;
  }
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function isNotFoundError(err: unknown): boolean {
  return isErrnoException(err) && err.code === "ENOENT";
}

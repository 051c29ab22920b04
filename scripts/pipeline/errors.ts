// Error taxonomy for the mirror engine. Task-scoped errors end up on a
// TransferOutcome; LedgerConflictError and LedgerUnavailableError abort the run.

export class CrawlError extends Error {
  constructor(message: string, public location: string, public cause?: unknown) {
    super(message);
    this.name = "CrawlError";
  }
}

export class TransferError extends Error {
  public status?: number;
  public timedOut: boolean;

  constructor(
    message: string,
    public location: string,
    options: { status?: number; timedOut?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "TransferError";
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

export class CorruptArchiveError extends Error {
  constructor(message: string, public archivePath: string, public cause?: unknown) {
    super(message);
    this.name = "CorruptArchiveError";
  }
}

export class LedgerConflictError extends Error {
  constructor(
    public location: string,
    public recordedPath: string,
    public attemptedPath: string,
  ) {
    super(
      `Ledger already maps ${location} to ${recordedPath}, refusing to record ${attemptedPath}`,
    );
    this.name = "LedgerConflictError";
  }
}

export class LedgerUnavailableError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "LedgerUnavailableError";
  }
}

export class IOError extends Error {
  constructor(
    message: string,
    public path: string,
    public code?: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "IOError";
  }
}

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/** Errors that must stop the whole run rather than a single task. */
export function isFatal(err: unknown): boolean {
  return err instanceof LedgerConflictError || err instanceof LedgerUnavailableError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const IO_ERROR_CODES = new Set(["ENOSPC", "EACCES", "EPERM", "EROFS", "EDQUOT", "EMFILE", "ENOTDIR", "EISDIR", "EEXIST"]);

/** Maps a Node filesystem error onto IOError when its errno code says "disk problem". */
export function asIOError(err: unknown, filePath: string): IOError | null {
  if (err instanceof IOError) return err;
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    if (IO_ERROR_CODES.has(err.code)) {
      return new IOError(`${err.code} while writing ${filePath}: ${err.message}`, filePath, err.code, err);
    }
  }
  return null;
}

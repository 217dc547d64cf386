export type ConfigErrorKind = "not-found" | "duplicate" | "unreadable";

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;
  readonly file: string;

  constructor(kind: ConfigErrorKind, message: string, file: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
    this.kind = kind;
    this.file = file;
  }
}

/** The window was focused but the new MRU order could not be written. */
export class StorageWriteError extends Error {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not save window order to ${file}: ${reason}`, { cause });
    this.name = "StorageWriteError";
    this.file = file;
  }
}

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

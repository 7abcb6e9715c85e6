export type WeaveErrorKind = "config" | "scan" | "conflict" | "io";

export class WeaveError extends Error {
  readonly kind: WeaveErrorKind;

  constructor(kind: WeaveErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

// Catalog or config problems. Fatal: raised before any file is touched.
export class ConfigError extends WeaveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
  }
}

export class ScanError extends WeaveError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("scan", message, options);
    this.filePath = filePath;
  }
}

export class WeaveConflict extends WeaveError {
  readonly filePath: string;
  readonly line: number;

  constructor(filePath: string, line: number, message: string) {
    super("conflict", message);
    this.filePath = filePath;
    this.line = line;
  }
}

export class IoError extends WeaveError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("io", message, options);
    this.filePath = filePath;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function errorKind(e: unknown): WeaveErrorKind | "internal" {
  return e instanceof WeaveError ? e.kind : "internal";
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class LockfileError extends Error {
  path: string;
  code?: string;
  constructor(message: string, path: string, code?: string) {
    super(message);
    this.name = "LockfileError";
    this.path = path;
    this.code = code;
  }
}

export class NoFreePortError extends Error {
  key: string;
  start: number;
  end: number;
  constructor(key: string, start: number, end: number) {
    super(`find port for ${key}: no free ports in range ${start}-${end}`);
    this.name = "NoFreePortError";
    this.key = key;
    this.start = start;
    this.end = end;
  }
}

export class ScanCancelledError extends Error {
  constructor(message = "scan cancelled") {
    super(message);
    this.name = "ScanCancelledError";
  }
}

export function isCancellation(err: unknown): err is ScanCancelledError {
  return err instanceof ScanCancelledError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

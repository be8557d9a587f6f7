export class AttachmentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AttachmentError";
  }
}

export class InvalidDateError extends AttachmentError {
  readonly value: string;

  constructor(message: string, options: { value: string }) {
    super(message);
    this.name = "InvalidDateError";
    this.value = options.value;
  }
}

export class InvalidNameError extends AttachmentError {
  readonly value: string;

  constructor(message: string, options: { value: string }) {
    super(message);
    this.name = "InvalidNameError";
    this.value = options.value;
  }
}

export class NotFoundError extends AttachmentError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "NotFoundError";
    this.path = options.path;
  }
}

export class IOError extends AttachmentError {
  readonly path: string;
  readonly code?: string;

  constructor(
    message: string,
    options: { path: string; code?: string; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "IOError";
    this.path = options.path;
    this.code = options.code;
  }
}

/** Errno code of a failed Node.js system call, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function toIOError(err: unknown, message: string, path: string): IOError {
  if (err instanceof IOError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new IOError(`${message}: ${detail}`, {
    path,
    code: errnoCode(err),
    cause: err,
  });
}

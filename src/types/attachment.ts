import type { DateKey } from "../attachment/date-key.js";
import type { AttachmentError, IOError, NotFoundError } from "../errors.js";

export interface Attachment {
  name: string;
  /** Absolute path inside the date's attachment folder */
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/** An attachment prepared for display in a file table. */
export interface AttachmentRow {
  name: string;
  sizeBytes: number;
  /** Human-readable size, e.g. "1.5 KB" */
  size: string;
  /** ISO 8601 */
  modifiedAt: string;
  /** Local "YYYY-MM-DD HH:mm" */
  modified: string;
}

export interface StoredFile {
  source: string;
  name: string;
  path: string;
}

export interface AddFileFailure {
  source: string;
  error: NotFoundError | IOError;
}

export interface AddFilesResult {
  dateKey: DateKey;
  folder: string;
  /** Successfully stored files, in source order */
  stored: StoredFile[];
  failures: AddFileFailure[];
}

/**
 * Capability shared by attachment backends. The folder store is one
 * implementation; a backend owning attachments by some other key (a database
 * row, for instance) would implement the same four operations.
 */
export interface AttachmentBackend {
  add(dateKey: string, sources: readonly string[]): Promise<AddFilesResult>;
  list(dateKey: string): Promise<Attachment[]>;
  delete(dateKey: string, fileName: string): Promise<void>;
  locate(dateKey: string, fileName: string): Promise<string>;
}

// --- Hooks ---

export interface AfterAddContext {
  dateKey: DateKey;
  result: AddFilesResult;
}

export interface AfterDeleteContext {
  dateKey: DateKey;
  name: string;
  path: string;
}

export interface AfterClearContext {
  dateKey: DateKey;
  folder: string;
  removed: number;
}

export interface ErrorContext {
  operation: AttachmentOperation;
  error: AttachmentError;
}

export type AttachmentOperation =
  | "add"
  | "list"
  | "delete"
  | "locate"
  | "open"
  | "openFolder"
  | "clear";

export type AfterAddHook = (ctx: AfterAddContext) => Promise<void> | void;
export type AfterDeleteHook = (ctx: AfterDeleteContext) => Promise<void> | void;
export type AfterClearHook = (ctx: AfterClearContext) => Promise<void> | void;
export type ErrorHook = (ctx: ErrorContext) => Promise<void> | void;

export interface AttachmentStoreHooks {
  afterAdd?: AfterAddHook[];
  afterDelete?: AfterDeleteHook[];
  afterClear?: AfterClearHook[];
  onError?: ErrorHook[];
}

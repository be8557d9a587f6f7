// Types
export type {
  Attachment,
  AttachmentRow,
  StoredFile,
  AddFileFailure,
  AddFilesResult,
  AttachmentBackend,
  AttachmentOperation,
  AfterAddContext,
  AfterDeleteContext,
  AfterClearContext,
  ErrorContext,
  AfterAddHook,
  AfterDeleteHook,
  AfterClearHook,
  ErrorHook,
  AttachmentStoreHooks,
} from "./types/index.js";

// Errors
export {
  AttachmentError,
  InvalidDateError,
  InvalidNameError,
  NotFoundError,
  IOError,
  errnoCode,
} from "./errors.js";

// Attachment store
export {
  FolderAttachmentStore,
  ATTACHMENTS_DIR_NAME,
  DateKeySchema,
  parseDateKey,
  isDateKey,
  dateKeyFromDate,
  FileNameSchema,
  parseFileName,
  splitName,
  suffixedName,
  compareNames,
  formatSize,
  formatModified,
  toAttachmentRow,
  mergeHooks,
} from "./attachment/index.js";
export type {
  FolderAttachmentStoreOptions,
  DateKey,
  FileName,
} from "./attachment/index.js";

// Shell
export { SystemOpener, openCommandFor, runCommand } from "./shell/opener.js";
export type { Opener, OpenCommand, CommandRunner, RunOptions } from "./shell/opener.js";

// MCP
export {
  createMcpServer,
  buildMcpServer,
  resolveDataDir,
  DEFAULT_DATA_DIR,
  createLoggingHooks,
  mcpLogSink,
  LOGGER_NAME,
} from "./mcp/index.js";
export type {
  CreateMcpServerOptions,
  McpServerOptions,
  LogLevel,
  LogSink,
  LogFailureHandler,
} from "./mcp/index.js";

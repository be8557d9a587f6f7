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
} from "./attachment.js";

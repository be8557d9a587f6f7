export { FolderAttachmentStore, ATTACHMENTS_DIR_NAME } from "./folder-store.js";
export type { FolderAttachmentStoreOptions } from "./folder-store.js";
export { DateKeySchema, parseDateKey, isDateKey, dateKeyFromDate } from "./date-key.js";
export type { DateKey } from "./date-key.js";
export { FileNameSchema, parseFileName } from "./file-name.js";
export type { FileName } from "./file-name.js";
export { splitName, suffixedName, candidateNames, compareNames } from "./naming.js";
export { formatSize, formatModified, toAttachmentRow } from "./format.js";
export {
  runAfterAddHooks,
  runAfterDeleteHooks,
  runAfterClearHooks,
  runErrorHooks,
  mergeHooks,
} from "./hooks.js";

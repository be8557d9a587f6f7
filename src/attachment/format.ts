import type { Attachment, AttachmentRow } from "../types/attachment.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

/** `512` → `"512 B"`, `1536` → `"1.5 KB"`; stops at TB. */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024 || unit === "TB") {
      return unit === "B" ? `${Math.round(value)} ${unit}` : `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:mm`. */
export function formatModified(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  );
}

export function toAttachmentRow(attachment: Attachment): AttachmentRow {
  return {
    name: attachment.name,
    sizeBytes: attachment.sizeBytes,
    size: formatSize(attachment.sizeBytes),
    modifiedAt: attachment.modifiedAt.toISOString(),
    modified: formatModified(attachment.modifiedAt),
  };
}

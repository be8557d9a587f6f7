import { z } from "zod";
import { AttachmentError } from "../../errors.js";
import type { FolderAttachmentStore } from "../../attachment/folder-store.js";
import { toAttachmentRow } from "../../attachment/format.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  structuredContent: Record<string, unknown>;
  isError: boolean;
};

const dateParam = z.string().describe("Calendar date in YYYY-MM-DD format");
const nameParam = z.string().describe("Attachment file name inside the date's folder");

export const AttachmentsAddParamsSchema = z.object({
  date: dateParam,
  sources: z.array(z.string()).min(1).describe("Paths of the files to copy in"),
});

export const AttachmentsListParamsSchema = z.object({
  date: dateParam,
});

export const AttachmentsDeleteParamsSchema = z.object({
  date: dateParam,
  name: nameParam,
});

export const AttachmentsOpenParamsSchema = z.object({
  date: dateParam,
  name: nameParam,
});

export const AttachmentsOpenFolderParamsSchema = z.object({
  date: dateParam,
});

export const AttachmentsClearParamsSchema = z.object({
  date: dateParam,
});

function ok(payload: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload,
    isError: false,
  };
}

/** Store errors become error results; anything else is a bug and propagates. */
function failed(err: unknown): ToolResult {
  if (!(err instanceof AttachmentError)) throw err;
  const payload = { error: { type: err.name, message: err.message } };
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    structuredContent: payload,
    isError: true,
  };
}

export async function handleAttachmentsAdd(
  store: FolderAttachmentStore,
  params: z.infer<typeof AttachmentsAddParamsSchema>,
): Promise<ToolResult> {
  try {
    const result = await store.addFiles(params.date, params.sources);
    return ok({
      date: result.dateKey,
      folder: result.folder,
      stored: result.stored.map((s) => ({ source: s.source, name: s.name })),
      failures: result.failures.map((f) => ({
        source: f.source,
        type: f.error.name,
        message: f.error.message,
      })),
    });
  } catch (err: unknown) {
    return failed(err);
  }
}

export async function handleAttachmentsList(
  store: FolderAttachmentStore,
  params: z.infer<typeof AttachmentsListParamsSchema>,
): Promise<ToolResult> {
  try {
    const files = await store.listFiles(params.date);
    return ok({ date: params.date, files: files.map(toAttachmentRow) });
  } catch (err: unknown) {
    return failed(err);
  }
}

export async function handleAttachmentsDelete(
  store: FolderAttachmentStore,
  params: z.infer<typeof AttachmentsDeleteParamsSchema>,
): Promise<ToolResult> {
  try {
    await store.deleteFile(params.date, params.name);
    return ok({ deleted: true });
  } catch (err: unknown) {
    return failed(err);
  }
}

export async function handleAttachmentsOpen(
  store: FolderAttachmentStore,
  params: z.infer<typeof AttachmentsOpenParamsSchema>,
): Promise<ToolResult> {
  try {
    const opened = await store.openFile(params.date, params.name);
    return ok({ opened });
  } catch (err: unknown) {
    return failed(err);
  }
}

export async function handleAttachmentsOpenFolder(
  store: FolderAttachmentStore,
  params: z.infer<typeof AttachmentsOpenFolderParamsSchema>,
): Promise<ToolResult> {
  try {
    const folder = await store.openDateFolder(params.date);
    return ok({ opened: folder });
  } catch (err: unknown) {
    return failed(err);
  }
}

export async function handleAttachmentsClear(
  store: FolderAttachmentStore,
  params: z.infer<typeof AttachmentsClearParamsSchema>,
): Promise<ToolResult> {
  try {
    const removed = await store.clearDate(params.date);
    return ok({ removed });
  } catch (err: unknown) {
    return failed(err);
  }
}

import { McpServer as SdkMcpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { FolderAttachmentStore } from "../attachment/folder-store.js";
import {
  AttachmentsAddParamsSchema,
  AttachmentsListParamsSchema,
  AttachmentsDeleteParamsSchema,
  AttachmentsOpenParamsSchema,
  AttachmentsOpenFolderParamsSchema,
  AttachmentsClearParamsSchema,
  handleAttachmentsAdd,
  handleAttachmentsList,
  handleAttachmentsDelete,
  handleAttachmentsOpen,
  handleAttachmentsOpenFolder,
  handleAttachmentsClear,
} from "./tools/attachments.js";
import { handleHealthCheck } from "./tools/health.js";

export interface McpServerOptions {
  /** サーバー名（MCP プロトコルの server_info.name） */
  serverName?: string;
  /** サーバーバージョン */
  serverVersion?: string;
  /** 添付ファイルの保存先ストア */
  store: FolderAttachmentStore;
}

/**
 * MCP プロトコル準拠のサーバーを生成し、添付ファイル操作ツールを登録する。
 */
export function buildMcpServer(options: McpServerOptions): SdkMcpServer {
  const {
    serverName = "day-attachments",
    serverVersion = "0.1.0",
    store,
  } = options;

  const server = new SdkMcpServer(
    { name: serverName, version: serverVersion },
    { capabilities: { tools: {}, logging: {} } },
  );

  // --- Attachment tools ---
  server.registerTool("attachments.add", {
    description: "Copy files into the attachment folder of a date",
    inputSchema: extractShape(AttachmentsAddParamsSchema),
  }, async (args) => {
    const parsed = AttachmentsAddParamsSchema.parse(args);
    return handleAttachmentsAdd(store, parsed);
  });

  server.registerTool("attachments.list", {
    description: "List the files attached to a date",
    inputSchema: extractShape(AttachmentsListParamsSchema),
  }, async (args) => {
    const parsed = AttachmentsListParamsSchema.parse(args);
    return handleAttachmentsList(store, parsed);
  });

  server.registerTool("attachments.delete", {
    description: "Delete one attached file",
    inputSchema: extractShape(AttachmentsDeleteParamsSchema),
  }, async (args) => {
    const parsed = AttachmentsDeleteParamsSchema.parse(args);
    return handleAttachmentsDelete(store, parsed);
  });

  server.registerTool("attachments.open", {
    description: "Open an attached file with the system's default application",
    inputSchema: extractShape(AttachmentsOpenParamsSchema),
  }, async (args) => {
    const parsed = AttachmentsOpenParamsSchema.parse(args);
    return handleAttachmentsOpen(store, parsed);
  });

  server.registerTool("attachments.openFolder", {
    description: "Reveal the attachment folder of a date, creating it if needed",
    inputSchema: extractShape(AttachmentsOpenFolderParamsSchema),
  }, async (args) => {
    const parsed = AttachmentsOpenFolderParamsSchema.parse(args);
    return handleAttachmentsOpenFolder(store, parsed);
  });

  server.registerTool("attachments.clear", {
    description: "Remove every file attached to a date",
    inputSchema: extractShape(AttachmentsClearParamsSchema),
  }, async (args) => {
    const parsed = AttachmentsClearParamsSchema.parse(args);
    return handleAttachmentsClear(store, parsed);
  });

  // --- Health tool ---
  server.registerTool("health.check", {
    description: "Check that the data directory is writable",
  }, async () => {
    return handleHealthCheck(store);
  });

  return server;
}

/**
 * Zod object schema から MCP SDK が受け付ける raw shape を抽出する。
 * MCP SDK の registerTool は ZodRawShape (Record<string, ZodType>) を期待する。
 */
function extractShape<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
): T {
  return schema.shape;
}

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { FolderAttachmentStore } from "../attachment/folder-store.js";
import { mergeHooks } from "../attachment/hooks.js";
import type { Opener } from "../shell/opener.js";
import type { AttachmentStoreHooks } from "../types/attachment.js";
import { createLoggingHooks, mcpLogSink } from "./logging.js";
import { buildMcpServer } from "./server.js";

export { buildMcpServer } from "./server.js";
export type { McpServerOptions } from "./server.js";
export { createLoggingHooks, mcpLogSink, LOGGER_NAME } from "./logging.js";
export type { LogLevel, LogSink, LogFailureHandler } from "./logging.js";

export const DEFAULT_DATA_DIR = ".day-attachments";

export interface CreateMcpServerOptions {
  /** サーバー名（MCP プロトコルの server_info.name） */
  serverName?: string;
  /** サーバーバージョン */
  serverVersion?: string;
  /** 添付ファイルのルートディレクトリ。未指定時は DAY_ATTACHMENTS_DATA_DIR、なければ ".day-attachments" */
  dataDir?: string;
  /** ファイル／フォルダを開く実装。デフォルト: SystemOpener */
  opener?: Opener;
  /** ストアのフック。MCP ログ通知用のフックの前に実行される */
  hooks?: AttachmentStoreHooks;
}

export function resolveDataDir(dataDir?: string): string {
  return dataDir ?? (process.env.DAY_ATTACHMENTS_DATA_DIR || DEFAULT_DATA_DIR);
}

/**
 * 添付ファイルストアを構築し、MCP サーバーとして公開する。
 * ストアの変更とエラーは MCP のログ通知として接続中のクライアントに送られる。
 *
 * @example
 * const server = createMcpServer({ dataDir: "./data" });
 *
 * // Start with stdio transport
 * const transport = new StdioServerTransport();
 * await server.connect(transport);
 */
export function createMcpServer(options?: CreateMcpServerOptions): McpServer {
  let server: McpServer | undefined;
  const store = new FolderAttachmentStore({
    dataDir: resolveDataDir(options?.dataDir),
    opener: options?.opener,
    hooks: mergeHooks(options?.hooks, createLoggingHooks(mcpLogSink(() => server))),
  });

  server = buildMcpServer({
    serverName: options?.serverName,
    serverVersion: options?.serverVersion,
    store,
  });
  return server;
}

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AttachmentStoreHooks } from "../types/attachment.js";

export type LogLevel = "debug" | "info" | "warning" | "error";

export interface LogSink {
  log(level: LogLevel, data: Record<string, unknown>): Promise<void>;
}

export const LOGGER_NAME = "attachments";

export type LogFailureHandler = (error: unknown) => void;

// stdout belongs to the stdio transport.
function writeToStderr(error: unknown): void {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${LOGGER_NAME}: failed to send log notification: ${detail}\n`);
}

/**
 * Forwards log records as MCP `notifications/message`. Records produced
 * while no client is connected are dropped, since there is nobody to
 * receive them. A failed send goes to `onFailure` and never reaches the
 * store operation that produced the record.
 */
export function mcpLogSink(
  getServer: () => McpServer | undefined,
  onFailure: LogFailureHandler = writeToStderr,
): LogSink {
  return {
    async log(level, data) {
      const server = getServer();
      if (!server?.isConnected()) return;
      try {
        await server.server.sendLoggingMessage({ level, logger: LOGGER_NAME, data });
      } catch (err: unknown) {
        onFailure(err);
      }
    },
  };
}

/** Store hooks that report every mutation and every error to `sink`. */
export function createLoggingHooks(sink: LogSink): AttachmentStoreHooks {
  return {
    afterAdd: [
      async ({ dateKey, result }) => {
        await sink.log(result.failures.length > 0 ? "warning" : "info", {
          event: "attachments.added",
          date: dateKey,
          stored: result.stored.map((s) => s.name),
          failed: result.failures.map((f) => f.source),
        });
      },
    ],
    afterDelete: [
      async ({ dateKey, name }) => {
        await sink.log("info", { event: "attachments.deleted", date: dateKey, name });
      },
    ],
    afterClear: [
      async ({ dateKey, removed }) => {
        await sink.log("info", { event: "attachments.cleared", date: dateKey, removed });
      },
    ],
    onError: [
      async ({ operation, error }) => {
        await sink.log("error", {
          event: "attachments.error",
          operation,
          type: error.name,
          message: error.message,
        });
      },
    ],
  };
}

import type { FolderAttachmentStore } from "../../attachment/folder-store.js";

export async function handleHealthCheck(
  store: Pick<FolderAttachmentStore, "checkHealth" | "dataDir">,
): Promise<{
  content: Array<{ type: "text"; text: string }>;
  structuredContent: Record<string, unknown>;
  isError: boolean;
}> {
  const result = await store.checkHealth();
  const payload = {
    ok: result.ok,
    timestamp: new Date().toISOString(),
    dependencies: {
      storage: {
        driver: "filesystem",
        dataDir: store.dataDir,
        ok: result.ok,
        error: result.error ?? null,
      },
    },
  };
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload,
    isError: false,
  };
}

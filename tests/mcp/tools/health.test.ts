import { describe, it, expect, vi } from "vitest";
import { handleHealthCheck } from "../../../src/mcp/tools/health.js";

function stubStore(ok: boolean, error?: string) {
  return {
    dataDir: "/data",
    checkHealth: vi.fn(async () => ({ ok, error })),
  };
}

describe("health tools", () => {
  it("returns a health payload", async () => {
    const result = await handleHealthCheck(stubStore(true));
    const parsed = JSON.parse(result.content[0].text);

    expect(parsed.ok).toBe(true);
    expect(typeof parsed.timestamp).toBe("string");
    expect(parsed.dependencies.storage).toEqual({
      driver: "filesystem",
      dataDir: "/data",
      ok: true,
      error: null,
    });
    expect(result.structuredContent).toEqual(parsed);
    expect(result.isError).toBe(false);
  });

  it("passes the storage error through", async () => {
    const result = await handleHealthCheck(stubStore(false, "EACCES: permission denied"));

    expect(result.structuredContent).toMatchObject({
      ok: false,
      dependencies: { storage: { ok: false, error: "EACCES: permission denied" } },
    });
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { withWorkspace } from "./workspace.js";

let parent: string;

beforeEach(async () => {
  parent = await fs.mkdtemp(path.join(os.tmpdir(), "workspace-test-"));
});

afterEach(async () => {
  await fs.rm(parent, { recursive: true, force: true });
});

describe("withWorkspace", () => {
  it("removes the directory after the work is done", async () => {
    const dir = await withWorkspace(
      async (d) => {
        await fs.writeFile(path.join(d, "0-scan.pdf"), "ocr output");
        return d;
      },
      { parent },
    );

    expect(path.dirname(dir)).toBe(parent);
    expect(path.basename(dir)).toMatch(/^pdf-refile-/);
    await expect(fs.access(dir)).rejects.toThrow();
  });

  it("removes the directory when the work throws", async () => {
    let seen = "";
    await expect(
      withWorkspace(
        async (d) => {
          seen = d;
          await fs.writeFile(path.join(d, "partial.pdf"), "");
          throw new Error("boom");
        },
        { parent },
      ),
    ).rejects.toThrow("boom");

    await expect(fs.access(seen)).rejects.toThrow();
  });

  it("stops listening for signals afterwards", async () => {
    const before = process.listenerCount("SIGINT");
    await withWorkspace(async () => {
      expect(process.listenerCount("SIGINT")).toBe(before + 1);
    }, { parent });
    expect(process.listenerCount("SIGINT")).toBe(before);
  });

  it("removes the directory and reports the signal on SIGINT", async () => {
    const onInterrupt = vi.fn();
    let seen = "";

    await withWorkspace(
      async (d) => {
        seen = d;
        await fs.writeFile(path.join(d, "0-scan.pdf"), "ocr output");
        process.emit("SIGINT", "SIGINT");
        await expect(fs.access(d)).rejects.toThrow();
      },
      { parent, onInterrupt },
    );

    expect(onInterrupt).toHaveBeenCalledWith("SIGINT");
    await expect(fs.access(seen)).rejects.toThrow();
  });
});

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { FileStore, createFileStore } from "../../src/shared/store/file.js";

describe("FileStore", () => {
  let dir: string;
  let store: FileStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "deep-research-store-"));
    store = new FileStore({ basePath: dir });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends .json to keys without an extension", () => {
    expect(store.getPath("reports/run-1/report")).toBe(path.join(dir, "reports/run-1/report.json"));
    expect(store.getPath("reports/run-1/report.md")).toBe(path.join(dir, "reports/run-1/report.md"));
  });

  it("round-trips JSON documents and creates directories", async () => {
    await store.write("runs/run-1/workers/st-1", { subtopic: "Raft", claims: [] });

    expect(await store.read("runs/run-1/workers/st-1")).toEqual({ subtopic: "Raft", claims: [] });

    const raw = await fs.readFile(path.join(dir, "runs/run-1/workers/st-1.json"), "utf-8");
    expect(raw).toBe('{\n  "subtopic": "Raft",\n  "claims": []\n}');
  });

  it("returns null for missing keys", async () => {
    expect(await store.read("missing")).toBeNull();
  });

  it("writes text artifacts under their own extension", async () => {
    await store.writeText("reports/run-1/report.md", "# Report\n");

    expect(await fs.readFile(path.join(dir, "reports/run-1/report.md"), "utf-8")).toBe("# Report\n");
  });

  it("writes compact JSON when pretty printing is off", async () => {
    const compact = createFileStore(dir, { prettyPrint: false });
    await compact.write("a", { b: 1 });

    expect(await fs.readFile(path.join(dir, "a.json"), "utf-8")).toBe('{"b":1}');
  });
});

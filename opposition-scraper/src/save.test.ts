import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArtifactStore } from "./save";
import { OppositionVerdict } from "./types";

let dir: string;
let store: ArtifactStore;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "artifact-store-"));
  store = new ArtifactStore(dir);
  await store.init();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const verdict: OppositionVerdict = {
  hasEvidence: true,
  oppositionTypes: ["land acquisition protests"],
  summary: "কৃষকরা জমি অধিগ্রহণের প্রতিবাদ করেছেন",
  confidence: 0.7,
  sources: ["https://example.org/a"],
};

describe("ArtifactStore", () => {
  it("creates the four stage directories", async () => {
    expect((await readdir(dir)).sort()).toEqual(["content", "result", "search", "summary"]);
  });

  it("writes indented snake_case json with non-ASCII text unescaped", async () => {
    await store.saveVerdict("351", verdict);
    const text = await readFile(join(dir, "summary", "351.json"), "utf-8");
    expect(text).toBe(
      [
        "{",
        '  "schema_version": 1,',
        '  "has_evidence": true,',
        '  "opposition_types": [',
        '    "land acquisition protests"',
        "  ],",
        '  "summary": "কৃষকরা জমি অধিগ্রহণের প্রতিবাদ করেছেন",',
        '  "confidence": 0.7,',
        '  "sources": [',
        '    "https://example.org/a"',
        "  ]",
        "}",
        "",
      ].join("\n")
    );
    expect(await readdir(join(dir, "summary"))).toEqual(["351.json"]);
  });

  it("reads back what it wrote", async () => {
    await store.saveQueries("351", { englishQuery: "solar protest", banglaQuery: "সৌর প্রতিবাদ" });
    await store.saveContent("351", [
      { url: "https://example.org/a", title: "A", text: "t", success: true },
      { url: "https://example.org/b", title: "B", text: "", success: false, error: "boom" },
    ]);
    await store.saveVerdict("351", verdict);

    expect(await store.readQueries("351")).toEqual({ englishQuery: "solar protest", banglaQuery: "সৌর প্রতিবাদ" });
    expect(await store.readContent("351")).toEqual([
      { url: "https://example.org/a", title: "A", text: "t", success: true },
      { url: "https://example.org/b", title: "B", text: "", success: false, error: "boom" },
    ]);
    expect(await store.readVerdict("351")).toEqual(verdict);
  });

  it("overwrites a stage on re-run", async () => {
    await store.saveVerdict("9", verdict);
    await store.saveVerdict("9", { ...verdict, confidence: 0.2 });
    expect((await store.readVerdict("9"))?.confidence).toBe(0.2);
  });

  it("treats missing or corrupt artifacts as absent", async () => {
    expect(await store.readVerdict("404")).toBeNull();
    await writeFile(join(dir, "search", "5.json"), "{ not json", "utf-8");
    expect(await store.readQueries("5")).toBeNull();
  });

  it("saves raw content per result index", async () => {
    const path = await store.saveRawContent("351", 2, "# Heading\nবাংলা");
    expect(path).toBe(join(dir, "content", "351_2.md"));
    expect(await readFile(path, "utf-8")).toBe("# Heading\nবাংলা");
  });

  it("survives concurrent writes to the same artifact", async () => {
    const writes = Array.from({ length: 20 }, (_, i) => store.saveVerdict("351", { ...verdict, confidence: i / 20 }));
    const settled = await Promise.allSettled(writes);

    expect(settled.every((s) => s.status === "fulfilled")).toBe(true);
    expect(await store.readVerdict("351")).not.toBeNull();
    expect(await readdir(join(dir, "summary"))).toEqual(["351.json"]);
  });

  it("refuses ids that would escape the stage directory", () => {
    expect(() => store.pathFor("summary", "../etc")).toThrow('Unsafe project id: "../etc"');
  });
});

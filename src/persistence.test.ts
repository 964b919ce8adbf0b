import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Persistence, type GenerationSnapshot } from "./persistence";

const params = { chunkSize: 100, chunkOverlap: 20, modelName: "letter-embedder" };

const snapshot: GenerationSnapshot = {
  generationId: 4,
  documents: [
    {
      id: "/docs/a.txt",
      source: "local-file",
      location: "a.txt",
      format: "text",
      byteLength: 5,
      status: "indexed",
      generationId: 4,
    },
  ],
  chunks: [
    {
      id: "/docs/a.txt#0",
      documentId: "/docs/a.txt",
      seq: 0,
      start: 0,
      end: 5,
      text: "aaaaa",
      emb: Float32Array.from([5, 0, 0.5, 1]),
    },
  ],
  fingerprints: { "/docs/a.txt": "abc123" },
};

describe("Persistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rag-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("round-trips a generation", async () => {
    const store = new Persistence(path.join(dir, "nested", "index.json"));
    await store.save(snapshot, params);
    const loaded = await store.load(params);
    expect(loaded).toEqual(snapshot);
    expect(loaded?.chunks[0]?.emb).toBeInstanceOf(Float32Array);
  });

  it("returns null when nothing was saved", async () => {
    await expect(new Persistence(path.join(dir, "none.json")).load(params)).resolves.toBeNull();
  });

  it("ignores snapshots built with other parameters", async () => {
    const store = new Persistence(path.join(dir, "index.json"));
    await store.save(snapshot, params);
    await expect(store.load({ ...params, chunkSize: 200 })).resolves.toBeNull();
    await expect(store.load({ ...params, modelName: "other" })).resolves.toBeNull();
  });

  it("ignores snapshots mixing embedding dimensions", async () => {
    const store = new Persistence(path.join(dir, "index.json"));
    const extra = { ...snapshot.chunks[0], id: "/docs/a.txt#1", seq: 1, emb: Float32Array.from([1, 2, 3, 4, 5]) };
    await store.save({ ...snapshot, chunks: [...snapshot.chunks, extra] }, params);
    await expect(store.load(params)).resolves.toBeNull();
  });

  it("ignores malformed files", async () => {
    const file = path.join(dir, "index.json");
    await fs.writeFile(file, JSON.stringify({ version: 1 }));
    await expect(new Persistence(file).load(params)).resolves.toBeNull();
    await fs.writeFile(file, "{not json");
    await expect(new Persistence(file).load(params)).resolves.toBeNull();
  });
});

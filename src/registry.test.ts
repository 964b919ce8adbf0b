import { describe, expect, it } from "vitest";
import { DocumentRegistry } from "./registry";
import type { DocumentDescriptor } from "./types";

const doc = (id: string): DocumentDescriptor => ({
  id,
  source: "local-file",
  location: id,
  format: "text",
});

describe("DocumentRegistry", () => {
  it("registers idempotently", () => {
    const registry = new DocumentRegistry();
    const first = registry.register(doc("/a.txt"));
    registry.markIndexing("/a.txt");
    const second = registry.register({ ...doc("/a.txt"), format: "pdf" });
    expect(second.status).toBe("indexing");
    expect(second.format).toBe("text");
    expect(first.status).toBe("unindexed");
    expect(registry.size).toBe(1);
  });

  it("walks unindexed -> indexing -> indexed and records the generation", () => {
    const registry = new DocumentRegistry();
    registry.register(doc("/a.txt"));
    expect(registry.status("/a.txt")).toBe("unindexed");
    registry.markIndexing("/a.txt");
    registry.markIndexed("/a.txt", 3);
    expect(registry.get("/a.txt")).toMatchObject({ status: "indexed", generationId: 3 });
  });

  it("keeps failed documents registered and retryable", () => {
    const registry = new DocumentRegistry();
    registry.register(doc("/a.txt"));
    registry.markIndexing("/a.txt");
    registry.markFailed("/a.txt", "boom");
    expect(registry.get("/a.txt")).toMatchObject({ status: "failed", error: "boom" });
    registry.markIndexing("/a.txt");
    expect(registry.get("/a.txt")?.error).toBeUndefined();
  });

  it("rejects invalid transitions", () => {
    const registry = new DocumentRegistry();
    registry.register(doc("/a.txt"));
    expect(() => registry.markIndexed("/a.txt", 1)).toThrow("Cannot mark /a.txt indexed");
    expect(() => registry.markFailed("/a.txt", "x")).toThrow("Cannot mark /a.txt failed");
    registry.markIndexing("/a.txt");
    expect(() => registry.markIndexing("/a.txt")).toThrow("already being indexed");
    expect(() => registry.markIndexing("/missing.txt")).toThrow("Unknown document");
  });

  it("lists records sorted by id, optionally by status", () => {
    const registry = new DocumentRegistry();
    registry.register(doc("/b.txt"));
    registry.register(doc("/a.txt"));
    registry.register(doc("/c.txt"));
    registry.markIndexing("/c.txt");
    expect(registry.list().map((r) => r.id)).toEqual(["/a.txt", "/b.txt", "/c.txt"]);
    expect(registry.list("unindexed").map((r) => r.id)).toEqual(["/a.txt", "/b.txt"]);
    expect(registry.status("/nope")).toBeUndefined();
  });
});

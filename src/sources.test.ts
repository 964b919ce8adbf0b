import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidRequestError, SourceUnavailableError } from "./errors";
import { DefaultSourceLoader, describeFile, describeUrl } from "./sources";
import type { DocumentRecord } from "./types";

describe("document descriptors", () => {
  it("resolves local paths to absolute forward-slash ids", () => {
    const d = describeFile("docs/../notes/a.md", "/work");
    expect(d).toEqual({ id: "/work/notes/a.md", source: "local-file", location: "docs/../notes/a.md", format: "markdown" });
    expect(describeFile("/work/notes/a.md", "/elsewhere").id).toBe(d.id);
  });

  it("normalizes URLs and drops the fragment", () => {
    const d = describeUrl(" HTTPS://Example.test/a/../page#section ");
    expect(d).toEqual({
      id: "https://example.test/page",
      source: "remote-url",
      location: "HTTPS://Example.test/a/../page#section",
      format: "html",
    });
  });

  it("rejects empty paths, malformed URLs and other protocols", () => {
    expect(() => describeFile("  ")).toThrow(InvalidRequestError);
    expect(() => describeUrl("not a url")).toThrow(InvalidRequestError);
    expect(() => describeUrl("ftp://example.test/a.txt")).toThrow("Unsupported URL protocol: ftp:");
  });
});

describe("DefaultSourceLoader", () => {
  let dir: string;
  const mockFetch = vi.fn();

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rag-sources-"));
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    mockFetch.mockReset();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const record = (over: Partial<DocumentRecord>): DocumentRecord => ({
    id: "x",
    source: "local-file",
    location: "x",
    format: "text",
    byteLength: 0,
    status: "indexing",
    ...over,
  });

  it("reads local files", async () => {
    await fs.writeFile(path.join(dir, "a.txt"), "hello");
    const loader = new DefaultSourceLoader(1000, dir);
    const out = await loader.load(record({ location: "a.txt" }));
    expect(new TextDecoder().decode(out)).toBe("hello");
  });

  it("reports missing files as unavailable", async () => {
    const loader = new DefaultSourceLoader(1000, dir);
    await expect(loader.load(record({ location: "missing.txt" }))).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it("fetches remote URLs", async () => {
    mockFetch.mockResolvedValue(new Response("<p>hi</p>", { status: 200 }));
    const loader = new DefaultSourceLoader(1000, dir);
    const out = await loader.load(
      record({ id: "https://example.test/page", source: "remote-url", location: "https://example.test/page" }),
    );
    expect(new TextDecoder().decode(out)).toBe("<p>hi</p>");
    expect(mockFetch).toHaveBeenCalledWith("https://example.test/page", expect.objectContaining({ redirect: "follow" }));
  });

  it("turns HTTP errors into SourceUnavailable", async () => {
    mockFetch.mockResolvedValue(new Response("gone", { status: 404 }));
    const loader = new DefaultSourceLoader(1000, dir);
    await expect(
      loader.load(record({ id: "https://example.test/x", source: "remote-url", location: "https://example.test/x" })),
    ).rejects.toThrow("https://example.test/x unavailable: HTTP error! status: 404");
  });
});

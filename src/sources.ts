import fs from "node:fs/promises";
import path from "node:path";
import { withTimeout } from "./async";
import { detectFormat } from "./extractor";
import { InvalidRequestError, SourceUnavailableError } from "./errors";
import type { DocumentDescriptor, DocumentRecord } from "./types";

/** Fetches the raw bytes of a registered document. */
export interface SourceLoader {
  load(doc: DocumentRecord, signal?: AbortSignal): Promise<Uint8Array>;
}

/**
 * Describe a local file: the id is its absolute path with forward slashes, so the same file
 * named through different relative paths maps to one document.
 */
export function describeFile(filePath: string, root = process.cwd()): DocumentDescriptor {
  const trimmed = filePath.trim();
  if (!trimmed) throw new InvalidRequestError("File path must not be empty");
  const abs = path.resolve(root, trimmed).split(path.sep).join("/");
  return { id: abs, source: "local-file", location: trimmed, format: detectFormat(abs) };
}

/** Describe a remote URL: the id is the WHATWG-normalized URL without its fragment. */
export function describeUrl(url: string): DocumentDescriptor {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    throw new InvalidRequestError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidRequestError(`Unsupported URL protocol: ${parsed.protocol}`);
  }
  parsed.hash = "";
  const id = parsed.href;
  return { id, source: "remote-url", location: url.trim(), format: detectFormat(id, true) };
}

/** Reads local files from disk and remote URLs over HTTP(S). */
export class DefaultSourceLoader implements SourceLoader {
  private readonly timeoutMs: number;
  private readonly root: string;

  /**
   * @param timeoutMs Per-request timeout for remote URLs.
   * @param root Base directory for relative file locations.
   */
  public constructor(timeoutMs: number, root = process.cwd()) {
    this.timeoutMs = timeoutMs;
    this.root = root;
  }

  public async load(doc: DocumentRecord, signal?: AbortSignal): Promise<Uint8Array> {
    if (doc.source === "local-file") {
      try {
        return new Uint8Array(await fs.readFile(path.resolve(this.root, doc.location)));
      } catch (e) {
        throw new SourceUnavailableError(doc.location, e);
      }
    }
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const response = await withTimeout(
        fetch(doc.id, { signal: controller.signal, redirect: "follow" }),
        this.timeoutMs,
        { context: `fetching ${doc.id}`, onTimeout: () => controller.abort() },
      );
      if (!response.ok) throw new Error(`HTTP error! status: ${response.status}`);
      return new Uint8Array(await response.arrayBuffer());
    } catch (e) {
      throw new SourceUnavailableError(doc.location, e);
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

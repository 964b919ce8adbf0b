import fg from "fast-glob";
import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { chunkText } from "../chunker";
import type { Embedder } from "../embeddings";
import { SourceUnavailableError, errorMessage } from "../errors";
import { type Extractor, detectFormat } from "../extractor";
import type { FetchedSnippet, Fetcher } from "../tools/types";
import { VectorIndex } from "../vector-index";

export interface FixedCorpusOptions {
  /** Directory holding the corpus. */
  dir: string;
  /** Label used in logs and errors. */
  name: string;
  embedder: Embedder;
  extractor: Extractor;
  chunkSize: number;
  chunkOverlap: number;
  /** Glob patterns relative to `dir`. */
  patterns?: string[];
  verbose?: boolean;
}

const DEFAULT_PATTERNS = ["**/*.{md,markdown,txt,html,htm}"];

/**
 * A fixed documentation corpus, indexed from a directory on first use and searched by
 * similarity afterwards. The corpus is its own small index, separate from the user's
 * document generations.
 */
export class FixedCorpusFetcher implements Fetcher {
  private readonly opts: FixedCorpusOptions;
  private loading: Promise<VectorIndex> | undefined;

  public constructor(opts: FixedCorpusOptions) {
    this.opts = opts;
  }

  public async fetch(query: string, maxResults: number, signal?: AbortSignal): Promise<FetchedSnippet[]> {
    const index = await this.load();
    if (index.size === 0) return [];
    const hits = index.query(await this.opts.embedder.embed(query, signal), maxResults);
    return hits.map(({ chunk, score }) => ({
      snippet: chunk.text,
      score,
      sourceUrl: pathToFileURL(chunk.documentId).href,
      title: path.relative(this.opts.dir, chunk.documentId).split(path.sep).join("/"),
    }));
  }

  /** Build the corpus index once; a failed build is retried on the next call. */
  public load(): Promise<VectorIndex> {
    this.loading ??= this.build().catch((e: unknown) => {
      this.loading = undefined;
      throw new SourceUnavailableError(this.opts.name, e);
    });
    return this.loading;
  }

  private async build(): Promise<VectorIndex> {
    const { dir, embedder, extractor, chunkSize, chunkOverlap, verbose } = this.opts;
    const files = await fg(this.opts.patterns ?? DEFAULT_PATTERNS, {
      cwd: dir,
      dot: false,
      absolute: true,
    });
    files.sort();
    console.error(`[RAG] Indexing ${files.length} file(s) of the ${this.opts.name} corpus...`);
    const index = new VectorIndex();
    for (const file of files) {
      let text: string;
      try {
        text = await extractor.extract(new Uint8Array(await fs.readFile(file)), detectFormat(file));
      } catch (e) {
        console.error(`[RAG] Skipping ${file}: ${errorMessage(e)}`);
        continue;
      }
      const documentId = path.resolve(file);
      const spans = [...chunkText(text, chunkSize, chunkOverlap)];
      const embedded = await Promise.all(
        spans.map(async (span) => ({ span, emb: await embedder.embed(span.text) })),
      );
      for (const { span, emb } of embedded) {
        index.ensureDimension(emb);
        index.insert({
          id: `${documentId}#${span.seq}`,
          documentId,
          seq: span.seq,
          start: span.start,
          end: span.end,
          text: span.text,
          emb,
        });
      }
      if (verbose) console.error(`[RAG][verbose] ${this.opts.name} corpus: ${file}`);
    }
    console.error(`[RAG] ${this.opts.name} corpus ready: ${index.size} chunks.`);
    return index;
  }
}

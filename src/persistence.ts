import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { DocumentRecord, EmbeddedChunk } from "./types";

/**
 * Parameters identifying a compatible snapshot. Chunk sizing and model name must match the
 * metadata found on disk; otherwise the load is treated as incompatible and returns `null`.
 */
export interface SnapshotParams {
  chunkSize: number;
  chunkOverlap: number;
  modelName: string;
}

/** The serializable content of one index generation. */
export interface GenerationSnapshot {
  generationId: number;
  documents: DocumentRecord[];
  chunks: EmbeddedChunk[];
  /** Content hash of each document's extracted text. */
  fingerprints: Record<string, string>;
}

const DocumentSchema = z.object({
  id: z.string(),
  source: z.enum(["local-file", "remote-url"]),
  location: z.string(),
  format: z.enum(["text", "markdown", "csv", "html", "pdf", "docx", "unknown"]),
  byteLength: z.number().int().nonnegative(),
  status: z.enum(["unindexed", "indexing", "indexed", "failed"]),
  generationId: z.number().int().optional(),
  error: z.string().optional(),
});

const ChunkSchema = z.object({
  id: z.string(),
  documentId: z.string(),
  seq: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  text: z.string(),
  emb: z.string(),
});

const SnapshotSchema = z.object({
  version: z.literal(2),
  meta: z.object({
    chunkSize: z.number(),
    chunkOverlap: z.number(),
    modelName: z.string(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  generationId: z.number().int().positive(),
  documents: z.array(DocumentSchema),
  chunks: z.array(ChunkSchema),
  fingerprints: z.record(z.string()),
});

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(s: string): Float32Array | null {
  const buf = Buffer.from(s, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy: the Buffer's pool offset need not be 4-byte aligned
  const out = new Float32Array(buf.byteLength / 4);
  new Uint8Array(out.buffer).set(buf);
  return out;
}

/**
 * Load / save the current generation as a single JSON file. Embeddings are stored as
 * base64-encoded 32-bit floats. A snapshot is a convenience for restarts, not a durability
 * guarantee: every failure is logged and treated as "no snapshot".
 */
export class Persistence {
  private readonly storePath: string;
  private readonly verbose: boolean;

  /**
   * @param storePath File path for the persisted index (JSON file).
   * @param verbose   Whether to emit verbose logging.
   */
  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /** Returns the stored generation if present and compatible with `params`, else null. */
  public async load(params: SnapshotParams): Promise<GenerationSnapshot | null> {
    if (!fsSync.existsSync(this.storePath)) return null;
    try {
      const raw: unknown = JSON.parse(await fs.readFile(this.storePath, "utf8"));
      const parsed = SnapshotSchema.safeParse(raw);
      if (!parsed.success) {
        console.error(`[RAG] Ignoring malformed index snapshot at ${this.storePath}`);
        return null;
      }
      const { meta } = parsed.data;
      if (
        meta.chunkSize !== params.chunkSize ||
        meta.chunkOverlap !== params.chunkOverlap ||
        meta.modelName !== params.modelName
      ) {
        console.error(`[RAG] Stored index incompatible (model/chunk params differ). Ignoring it.`);
        return null;
      }
      const chunks: EmbeddedChunk[] = [];
      for (const c of parsed.data.chunks) {
        const emb = decodeVector(c.emb);
        if (!emb) continue; // require embedding
        chunks.push({ ...c, emb });
      }
      const dimension = chunks[0]?.emb.length;
      if (chunks.some((c) => c.emb.length !== dimension)) {
        console.error(`[RAG] Ignoring index snapshot with mixed embedding dimensions at ${this.storePath}`);
        return null;
      }
      console.error(`[RAG] Loaded persisted index: ${chunks.length} chunks.`);
      if (this.verbose) console.error(`[RAG][verbose] Loaded from ${this.storePath}`);
      return {
        generationId: parsed.data.generationId,
        documents: parsed.data.documents,
        chunks,
        fingerprints: parsed.data.fingerprints,
      };
    } catch (e) {
      console.error(`[RAG] Failed to load store at ${this.storePath}:`, e);
      return null;
    }
  }

  /** Persist a generation snapshot. */
  public async save(snapshot: GenerationSnapshot, params: SnapshotParams): Promise<void> {
    try {
      const out = {
        version: 2,
        meta: {
          ...params,
          savedAt: new Date().toISOString(),
          embEncoding: "f32-base64",
        },
        generationId: snapshot.generationId,
        documents: snapshot.documents,
        fingerprints: snapshot.fingerprints,
        chunks: snapshot.chunks.map((c) => ({
          id: c.id,
          documentId: c.documentId,
          seq: c.seq,
          start: c.start,
          end: c.end,
          text: c.text,
          emb: encodeVector(c.emb),
        })),
      };
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(this.storePath, JSON.stringify(out));
      if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
    } catch (e) {
      console.error(`[RAG] Failed to save index store:`, e);
    }
  }
}

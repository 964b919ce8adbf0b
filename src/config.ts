import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidConfigError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call. A .env at the project root wins; otherwise the
// default lookup (cwd) applies.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

/** Recognized index / retrieval options. */
export interface IndexOptions {
  /** Characters per chunk (> 0). */
  chunkSize: number;
  /** Characters shared by adjacent chunks (0 <= overlap < chunkSize). */
  chunkOverlap: number;
  /** Results per document-index query (> 0). */
  similarityTopK: number;
  /** Per-tool-call timeout (> 0). */
  toolTimeoutMs: number;
  /** Bounded pool size for embedding calls and tool fan-out (> 0). */
  maxConcurrency: number;
}

export const DEFAULT_INDEX_OPTIONS: IndexOptions = {
  chunkSize: 1200,
  chunkOverlap: 200,
  similarityTopK: 4,
  toolTimeoutMs: 8000,
  maxConcurrency: 4,
};

/**
 * Reject bad index options before any work starts.
 *
 * @throws {InvalidConfigError}
 */
export function validateIndexOptions(opts: IndexOptions): IndexOptions {
  const positive: Array<keyof IndexOptions> = [
    "chunkSize",
    "similarityTopK",
    "toolTimeoutMs",
    "maxConcurrency",
  ];
  for (const key of positive) {
    const v = opts[key];
    if (!Number.isInteger(v) || v <= 0) {
      throw new InvalidConfigError(`${key} must be a positive integer, got ${v}`);
    }
  }
  if (!Number.isInteger(opts.chunkOverlap) || opts.chunkOverlap < 0) {
    throw new InvalidConfigError(`chunkOverlap must be a non-negative integer, got ${opts.chunkOverlap}`);
  }
  if (opts.chunkOverlap >= opts.chunkSize) {
    throw new InvalidConfigError(
      `chunkOverlap (=${opts.chunkOverlap}) must be smaller than chunkSize (=${opts.chunkSize})`,
    );
  }
  return opts;
}

export interface Config {
  INDEX: IndexOptions;
  QUERY_DEADLINE_MS: number;
  EMBEDDING_MAX_RETRIES: number;
  EMBEDDING_RETRY_BASE_MS: number;
  /** Entries kept for document chunks. */
  EMBEDDING_CACHE_SIZE: number;
  /** Entries kept for queries and passages fetched per question. */
  QUERY_CACHE_SIZE: number;
  MAX_EVIDENCE: number;
  SNIPPET_MAX_CHARS: number;
  HISTORY_TURNS: number;
  EMBEDDING_MODEL: string;
  CHAT_MODEL: string;
  BRAVE_SEARCH_API_KEY: string | undefined;
  FIXED_CORPUS_DIR: string | undefined;
  FIXED_CORPUS_NAME: string;
  FIXED_CORPUS_KEYWORDS: string[];
  INDEX_FILES: string[];
  INDEX_URLS: string[];
  INDEX_STORE_PATH: string | undefined;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

function list(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Integer env knob: unset or unparsable values fall back to the default. */
function int(raw: string | undefined, fallback: number, min = 1): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.floor(n) : fallback;
}

/**
 * Parse runtime configuration from environment variables.
 *
 * @throws {InvalidConfigError} when the resulting index options are inconsistent (for example
 *   CHUNK_OVERLAP >= CHUNK_SIZE).
 */
export function getConfig(env: Env = process.env): Config {
  const INDEX = validateIndexOptions({
    chunkSize: int(env.CHUNK_SIZE, DEFAULT_INDEX_OPTIONS.chunkSize),
    chunkOverlap: int(env.CHUNK_OVERLAP, DEFAULT_INDEX_OPTIONS.chunkOverlap, 0),
    similarityTopK: int(env.SIMILARITY_TOP_K, DEFAULT_INDEX_OPTIONS.similarityTopK),
    toolTimeoutMs: int(env.TOOL_TIMEOUT_MS, DEFAULT_INDEX_OPTIONS.toolTimeoutMs),
    maxConcurrency: int(env.MAX_CONCURRENCY, DEFAULT_INDEX_OPTIONS.maxConcurrency),
  });

  // Verbosity toggle with tolerant truthy parsing (supports several common forms).
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  const FIXED_CORPUS_NAME = env.FIXED_CORPUS_NAME?.trim() || "docs";
  const keywords = list(env.FIXED_CORPUS_KEYWORDS);

  return {
    INDEX,
    QUERY_DEADLINE_MS: int(env.QUERY_DEADLINE_MS, 15000),
    EMBEDDING_MAX_RETRIES: int(env.EMBEDDING_MAX_RETRIES, 2, 0),
    EMBEDDING_RETRY_BASE_MS: int(env.EMBEDDING_RETRY_BASE_MS, 250, 0),
    EMBEDDING_CACHE_SIZE: int(env.EMBEDDING_CACHE_SIZE, 50_000),
    QUERY_CACHE_SIZE: int(env.QUERY_CACHE_SIZE, 2_000),
    MAX_EVIDENCE: int(env.MAX_EVIDENCE, 8),
    SNIPPET_MAX_CHARS: int(env.SNIPPET_MAX_CHARS, 700),
    HISTORY_TURNS: int(env.HISTORY_TURNS, 6, 0),
    EMBEDDING_MODEL: env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small",
    CHAT_MODEL: env.CHAT_MODEL?.trim() || "gpt-4o-mini",
    BRAVE_SEARCH_API_KEY: env.BRAVE_SEARCH_API_KEY?.trim() || undefined,
    FIXED_CORPUS_DIR: env.FIXED_CORPUS_DIR?.trim() || undefined,
    FIXED_CORPUS_NAME,
    FIXED_CORPUS_KEYWORDS: keywords.length ? keywords : [FIXED_CORPUS_NAME],
    INDEX_FILES: list(env.INDEX_FILES),
    INDEX_URLS: list(env.INDEX_URLS),
    INDEX_STORE_PATH: env.INDEX_STORE_PATH?.trim() || undefined,
    VERBOSE,
    // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
  };
}

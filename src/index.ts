/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (dotenv, see config.ts) and validate the index options.
 * 2. Create the OpenAI-backed embedders (cached, retried, bounded) and answerer. Document chunks
 *    and per-question texts get separate caches sharing one concurrency limit.
 * 3. Restore the persisted index generation when INDEX_STORE_PATH holds a compatible snapshot,
 *    then index INDEX_FILES / INDEX_URLS when given (an explicit selection, never a disk scan).
 * 4. Register the retrieval tools: user documents, fixed corpus (when FIXED_CORPUS_DIR is set),
 *    arXiv, Wikipedia quick and deep lookup, Brave web search.
 * 5. Start the MCP server over stdio (default) or streamable HTTP (MCP_TRANSPORT=http).
 *
 * OPENAI_API_KEY is read by the OpenAI client itself.
 */
import OpenAI from "openai";
import { createLimiter } from "./async";
import { OpenAIAnswerer } from "./answerer";
import { APP_VERSION, type Config, getConfig } from "./config";
import { CachingEmbedder, OpenAIEmbedder } from "./embeddings";
import { errorMessage } from "./errors";
import { DefaultExtractor } from "./extractor";
import { ArxivFetcher } from "./fetchers/arxiv";
import { BraveSearchFetcher } from "./fetchers/brave";
import { FixedCorpusFetcher } from "./fetchers/corpus";
import { WikipediaDeepFetcher, WikipediaQuickFetcher } from "./fetchers/wikipedia";
import { Indexer } from "./indexer";
import { Orchestrator } from "./orchestrator";
import { Persistence } from "./persistence";
import { DocumentRegistry } from "./registry";
import { createServerFactory } from "./server";
import { DefaultSourceLoader } from "./sources";
import { statusManager } from "./status";
import { DocumentIndexTool } from "./tools/document-index-tool";
import { FetcherTool } from "./tools/fetcher-tool";
import type { RetrievalTool } from "./tools/types";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();
const { INDEX, VERBOSE } = config;

const openai = new OpenAI();
const openaiEmbedder = new OpenAIEmbedder(openai, config.EMBEDDING_MODEL);
const embedOptions = {
  maxRetries: config.EMBEDDING_MAX_RETRIES,
  retryBaseMs: config.EMBEDDING_RETRY_BASE_MS,
  limiter: createLimiter(INDEX.maxConcurrency),
  verbose: VERBOSE,
};
// document chunks and one-off texts (queries, fetched passages) are cached apart
const embedder = new CachingEmbedder(openaiEmbedder, {
  ...embedOptions,
  cacheSize: config.EMBEDDING_CACHE_SIZE,
});
const transientEmbedder = new CachingEmbedder(openaiEmbedder, {
  ...embedOptions,
  cacheSize: config.QUERY_CACHE_SIZE,
});
statusManager.setModelName(embedder.modelName);

const extractor = new DefaultExtractor(VERBOSE);
const registry = new DocumentRegistry();
const indexer = new Indexer({
  registry,
  embedder,
  queryEmbedder: transientEmbedder,
  extractor,
  loader: new DefaultSourceLoader(INDEX.toolTimeoutMs),
  options: INDEX,
  persistence: config.INDEX_STORE_PATH ? new Persistence(config.INDEX_STORE_PATH, VERBOSE) : undefined,
  status: statusManager,
  verbose: VERBOSE,
});

if (await indexer.restore()) {
  console.error(`[RAG] Restored ${indexer.indexedDocumentCount()} document(s) from ${config.INDEX_STORE_PATH}`);
}
if (config.INDEX_FILES.length || config.INDEX_URLS.length) {
  try {
    const report = await indexer.indexSelection({ files: config.INDEX_FILES, urls: config.INDEX_URLS });
    console.error(`[RAG] Startup selection: ${report.indexed} indexed, ${report.failed} failed.`);
  } catch (e) {
    console.error(`[RAG] Startup indexing failed: ${errorMessage(e)}`);
  }
}

const toolLimits = {
  maxResults: INDEX.similarityTopK,
  snippetMaxChars: config.SNIPPET_MAX_CHARS,
  timeoutMs: INDEX.toolTimeoutMs,
  verbose: VERBOSE,
};
const tools: RetrievalTool[] = [
  new DocumentIndexTool({
    indexer,
    topK: INDEX.similarityTopK,
    snippetMaxChars: config.SNIPPET_MAX_CHARS,
    timeoutMs: INDEX.toolTimeoutMs,
  }),
  new FetcherTool({
    ...toolLimits,
    tag: "academic",
    name: "arxiv",
    description: "arXiv paper search. Use when the query references arXiv, papers or an arXiv id.",
    fetcher: new ArxivFetcher(),
  }),
  new FetcherTool({
    ...toolLimits,
    tag: "fast-factual",
    name: "wikipedia",
    description: "Wikipedia quick lookup for short factual questions that need a brief summary.",
    fetcher: new WikipediaQuickFetcher(),
  }),
  new FetcherTool({
    ...toolLimits,
    tag: "deep-contextual",
    name: "wikipedia_rag",
    description: "Deep Wikipedia lookup for detailed context, comparisons, timelines or quotations.",
    fetcher: new WikipediaDeepFetcher({ embedder: transientEmbedder }),
  }),
  new FetcherTool({
    ...toolLimits,
    tag: "web",
    name: "web_search",
    description: "General web search for recent or otherwise uncovered topics.",
    fetcher: new BraveSearchFetcher(config.BRAVE_SEARCH_API_KEY),
  }),
];
if (config.FIXED_CORPUS_DIR) {
  tools.push(
    new FetcherTool({
      ...toolLimits,
      tag: "fixed-corpus",
      name: `${config.FIXED_CORPUS_NAME}_search`,
      description: `Search the ${config.FIXED_CORPUS_NAME} documentation. Use only for questions about ${config.FIXED_CORPUS_KEYWORDS.join(", ")}.`,
      fetcher: new FixedCorpusFetcher({
        dir: config.FIXED_CORPUS_DIR,
        name: config.FIXED_CORPUS_NAME,
        embedder: transientEmbedder,
        extractor,
        chunkSize: INDEX.chunkSize,
        chunkOverlap: INDEX.chunkOverlap,
        verbose: VERBOSE,
      }),
    }),
  );
}

const orchestrator = new Orchestrator({
  tools,
  answerer: new OpenAIAnswerer(openai, config.CHAT_MODEL, VERBOSE),
  indexedDocuments: () => indexer.indexedDocumentCount(),
  maxConcurrency: INDEX.maxConcurrency,
  deadlineMs: config.QUERY_DEADLINE_MS,
  maxEvidence: config.MAX_EVIDENCE,
  historyTurns: config.HISTORY_TURNS,
  corpusKeywords: config.FIXED_CORPUS_DIR ? config.FIXED_CORPUS_KEYWORDS : undefined,
  verbose: VERBOSE,
});

const createServer = createServerFactory({
  name: "multi-source-rag-server",
  version: APP_VERSION,
  orchestrator,
  indexer,
  registry,
  status: statusManager,
});

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
if (useHttp) {
  await startHttpTransport(createServer, statusManager);
} else {
  await startStdioTransport(createServer, statusManager);
}

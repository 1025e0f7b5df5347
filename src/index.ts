import { AnalyticsRecorder, formatSummary } from "./analytics/recorder.js";
import { ResponseCache } from "./cache/response-cache.js";
import { ConversationOrchestrator } from "./chat/orchestrator.js";
import { loadConfig, type AppConfig } from "./config.js";
import { buildChunks } from "./knowledge/chunk-builder.js";
import { loadKnowledgeDocument } from "./knowledge/loader.js";
import { derivePersona, loadDirective } from "./knowledge/persona.js";
import type { KnowledgeDocument } from "./knowledge/schema.js";
import { createLlmClient } from "./llm/client.js";
import { ChatGenerator } from "./llm/generator.js";
import { log } from "./logger.js";
import { PineconeEmbedder } from "./retrieval/embedder.js";
import { EmbeddingIndex } from "./retrieval/embedding-index.js";
import { FileVectorStore } from "./retrieval/file-store.js";
import { getPineconeClient } from "./retrieval/pinecone.js";
import { PineconeVectorStore } from "./retrieval/pinecone-store.js";
import { Retriever } from "./retrieval/retriever.js";
import type { VectorStore } from "./retrieval/vector-store.js";
import { createApiServer, startApiServer, stopApiServer } from "./server/http.js";
import { SessionStore } from "./session/store.js";

// ── Main ─────────────────────────────────────────────────

async function openVectorStore(config: AppConfig): Promise<VectorStore> {
  if (config.vectorBackend === "pinecone") {
    return new PineconeVectorStore(
      getPineconeClient(config.pineconeApiKey),
      config.pineconeIndex,
      config.vectorCollection,
    );
  }
  return FileVectorStore.open(config.vectorStorePath, config.vectorCollection);
}

async function main() {
  const config = loadConfig();
  log.info(
    {
      model: config.llmModel,
      embeddingModel: config.embeddingModel,
      backend: config.vectorBackend,
      knowledgeBase: config.knowledgeBasePath,
    },
    "🚀 Starting knowledge base assistant",
  );

  // Corpus → chunks → index. Any failure here stops startup.
  const doc = await loadKnowledgeDocument(config.knowledgeBasePath);
  const chunks = buildChunks(doc);
  log.info({ chunks: chunks.length }, "✂️  Knowledge document chunked");

  const embedder = new PineconeEmbedder(
    getPineconeClient(config.pineconeApiKey),
    config.embeddingModel,
  );
  const index = new EmbeddingIndex(await openVectorStore(config), embedder);

  const orchestrator = await buildOrchestrator(config, index, doc);
  let ready = false;
  const server = createApiServer({
    orchestrator,
    indexedChunks: async () => (ready ? index.count() : undefined),
  });
  await startApiServer(server, config.port);

  await index.build(chunks, { force: config.forceRebuild });
  ready = true;
  log.info("✅ Assistant is online. Waiting for questions...");

  const shutdown = async () => {
    log.info("👋 Shutting down...");
    await stopApiServer(server);
    log.info(formatSummary(orchestrator.getSummary()));
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

async function buildOrchestrator(
  config: AppConfig,
  index: EmbeddingIndex,
  doc: KnowledgeDocument,
): Promise<ConversationOrchestrator> {
  const persona = derivePersona(
    doc,
    {
      companyName: config.companyName,
      contactEmail: config.contactEmail,
      website: config.companyWebsite,
    },
    await loadDirective(config.systemPromptPath),
  );

  const sessions = new SessionStore({
    ttlMs: config.sessionTtlMs,
    windowSize: config.sessionWindow,
    contextTurns: config.sessionContextTurns,
  });

  return new ConversationOrchestrator({
    sessions,
    cache: new ResponseCache({ ttlMs: config.cacheTtlMs }),
    analytics: new AnalyticsRecorder({ capacity: config.analyticsCapacity }),
    retriever: new Retriever(index),
    generator: new ChatGenerator(createLlmClient(config.openRouterApiKey), {
      model: config.llmModel,
      fallbackModel: config.fallbackModel || undefined,
      temperature: config.llmTemperature,
    }),
    persona,
    topK: config.retrievalTopK,
  });
}

main().catch((error) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});

// node/src/services/pipeline-deps.ts — shared pipeline dependencies for the HTTP routes
import type { AppConfig } from '@/config/app.config';
import type { OrchestratorDeps } from '@/services/orchestrator';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import type { VectorIndex } from '@/services/providers/vector/vector-index';
import type { SessionStore } from '@/memory/SessionStore';
import type { LlmJsonClient } from '@/services/llm-client';
import type { FundingSource } from '@/services/providers/sources/funding-source';
import { OpenAiJsonClient } from '@/services/llm-client';
import { OpenAIEmbedder } from '@/services/providers/embeddings/openai-embedder';
import { SimpleEmbedder } from '@/services/providers/embeddings/simple-embedder';
import { PineconeVectorIndex } from '@/services/providers/vector/pinecone-index';
import { InMemoryVectorIndex, type VectorEntry } from '@/services/providers/vector/in-memory-index';
import { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import { FundingVectorRetriever } from '@/services/providers/funding/funding-retriever';
import { HybridFundingRetriever } from '@/services/providers/funding/funding-retriever-hybrid';
import { VectorSource } from '@/services/providers/sources/vector-source';
import { DatasetKeywordSource } from '@/services/providers/sources/dataset-source';
import { loadCuratedSources } from '@/services/providers/sources/curated-catalog-source';
import { ComprehensiveSearch } from '@/services/comprehensive-search';
import { ProgramSelector } from '@/services/program-selector';
import { ProgramEnricher } from '@/services/program-enricher';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import { RedisSessionStore } from '@/memory/RedisSessionStore';
import { programName } from '@/services/program-fields';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

export interface AppDeps {
  pipeline: OrchestratorDeps;
  sessions: SessionStore;
}

/** Replaceable collaborators; anything left out is built from config. */
export interface DepsOverrides {
  embedder?: Embedder;
  index?: VectorIndex;
  dataset?: FundingDataset;
  llm?: LlmJsonClient;
  sessions?: SessionStore;
  sources?: FundingSource[];
}

/** Embeds every dataset row into an in-process index, for runs without Pinecone. */
export async function seedIndexFromDataset(
  index: InMemoryVectorIndex,
  namespace: string,
  dataset: FundingDataset,
  embedder: Embedder,
): Promise<void> {
  const entries: VectorEntry[] = [];
  for (const [i, row] of dataset.rows.entries()) {
    const text = [programName(row), row.description, row.domain, row.eligibility, row.location]
      .filter(Boolean)
      .join(' ');
    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(row)) {
      if (typeof value === 'string') metadata[key] = value;
    }
    entries.push({ id: `row-${i}`, vector: await embedder.embed(text), metadata });
  }
  index.upsert(namespace, entries);
  logger.info('vector_index:seeded', { namespace, entries: entries.length });
}

async function createSessionStore(config: AppConfig): Promise<SessionStore> {
  const fallback = () => new InMemorySessionStore({ ttlMinutes: config.session.ttlMinutes });
  if (!config.session.redisUrl) return fallback();

  const redis = new RedisSessionStore(config.session.redisUrl, config.session.ttlMinutes);
  try {
    await redis.connect();
    return redis;
  } catch (err) {
    logger.warn('session:redis_unavailable', { error: errorMessage(err), fallback: 'memory' });
    await redis.destroy();
    return fallback();
  }
}

export async function createPipelineDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const dataset = overrides.dataset ?? FundingDataset.load(config.data.fundingCsvPath);

  let embedder = overrides.embedder;
  if (!embedder) {
    if (config.openai.apiKey) {
      embedder = new OpenAIEmbedder({
        apiKey: config.openai.apiKey,
        model: config.openai.embeddingModel,
        dimensions: config.openai.embeddingDimensions,
      });
    } else {
      logger.warn('embedder:offline', { reason: 'OPENAI_API_KEY not set', using: 'SimpleEmbedder' });
      embedder = new SimpleEmbedder();
    }
  }

  let index = overrides.index;
  if (!index) {
    if (config.pinecone.apiKey) {
      index = new PineconeVectorIndex({ apiKey: config.pinecone.apiKey, indexName: config.pinecone.indexName });
    } else {
      const memoryIndex = new InMemoryVectorIndex();
      await seedIndexFromDataset(memoryIndex, config.pinecone.namespace, dataset, embedder);
      index = memoryIndex;
    }
  }

  const vectorRetriever = new FundingVectorRetriever(embedder, index, {
    namespace: config.pinecone.namespace,
    topK: config.pipeline.topK,
    timeoutMs: config.resilience.retrievalTimeoutMs,
    maxRetries: config.resilience.maxRetries,
  });
  const hybrid = new HybridFundingRetriever(vectorRetriever, dataset, { want: config.pipeline.want });

  const sources = overrides.sources ?? [
    new VectorSource(vectorRetriever),
    new DatasetKeywordSource(dataset),
    ...loadCuratedSources(config.data.curatedSourcesPath),
  ];
  const comprehensive = new ComprehensiveSearch(sources, {
    concurrency: config.pipeline.sourceConcurrency,
    timeoutMs: config.resilience.retrievalTimeoutMs,
    want: config.pipeline.want,
  });

  const llm =
    overrides.llm ??
    new OpenAiJsonClient({
      apiKey: config.openai.apiKey,
      timeoutMs: config.resilience.llmTimeoutMs,
      maxRetries: config.resilience.maxRetries,
    });

  return {
    pipeline: {
      search: hybrid,
      comprehensiveSearch: comprehensive,
      dataset,
      selector: new ProgramSelector(llm, { model: config.openai.selectModel, wanted: config.pipeline.wanted }),
      enricher: new ProgramEnricher(llm, { model: config.openai.enrichModel }),
      defaults: { want: config.pipeline.want, wanted: config.pipeline.wanted },
    },
    sessions: overrides.sessions ?? (await createSessionStore(config)),
  };
}

let cachedDeps: Promise<AppDeps> | null = null;

/**
 * Returns shared pipeline dependencies, built once per process.
 */
export function getPipelineDeps(config: AppConfig): Promise<AppDeps> {
  if (!cachedDeps) {
    cachedDeps = createPipelineDeps(config).catch((err: unknown) => {
      cachedDeps = null;
      throw err;
    });
  }
  return cachedDeps;
}

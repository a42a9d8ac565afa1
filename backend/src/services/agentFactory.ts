import { config, type AppConfig } from '../config/app.js';
import { OpenAIDecisionService } from '../openai/decisionService.js';
import { getModelClient, type ModelClient } from '../openai/openaiClient.js';
import { FarmAgent } from '../orchestrator/index.js';
import type { ThoughtSink } from '../orchestrator/thoughtLog.js';
import { OpenAIQueryExpander } from '../retrieval/queryExpansion.js';
import { SchemeRetriever } from '../retrieval/retriever.js';
import { SqliteSchemeIndex } from '../retrieval/schemeIndex.js';
import { DiseaseDiagnosisTool, MarketPriceTool, SchemeSearchTool, buildToolRegistry } from '../tools/index.js';
import { OpenAIEmbeddingService } from '../utils/embeddings.js';
import { ChatService } from './chatService.js';
import { SessionStore } from './sessionStore.js';

export interface AgentRuntimeOptions {
  settings?: AppConfig;
  client?: ModelClient;
  thoughtSink?: ThoughtSink;
  schemeIndex?: SqliteSchemeIndex;
  sessionStore?: SessionStore;
}

export interface AgentRuntime {
  chatService: ChatService;
  schemeIndex: SqliteSchemeIndex;
  sessionStore: SessionStore;
  close(): void;
}

/**
 * Wires the model client, tools, registry and session handling. Each session
 * gets its own FarmAgent; the registry and tools are shared, being read-only
 * once built.
 */
export function createAgentRuntime(options: AgentRuntimeOptions = {}): AgentRuntime {
  const settings = options.settings ?? config;
  const client = options.client ?? getModelClient();
  const schemeIndex = options.schemeIndex ?? new SqliteSchemeIndex(settings.SCHEME_DB_PATH);
  const sessionStore = options.sessionStore ?? new SessionStore(settings.SESSION_DB_PATH);

  const retriever = new SchemeRetriever(
    {
      expander: new OpenAIQueryExpander(client, {
        model: settings.EXPANSION_MODEL,
        temperature: settings.EXPANSION_TEMPERATURE
      }),
      embedder: new OpenAIEmbeddingService(client, {
        model: settings.EMBEDDING_MODEL,
        batchSize: settings.EMBEDDING_BATCH_SIZE
      }),
      index: schemeIndex
    },
    { candidatesPerQuery: settings.SCHEME_CANDIDATES_PER_QUERY }
  );

  const registry = buildToolRegistry({
    market: new MarketPriceTool({
      apiUrl: settings.MARKET_API_URL,
      apiKey: settings.DATA_GOV_IN_API_KEY,
      timeoutMs: settings.MARKET_REQUEST_TIMEOUT_MS,
      maxRetries: settings.MARKET_MAX_RETRIES
    }),
    diagnosis: new DiseaseDiagnosisTool(client, {
      model: settings.VISION_MODEL,
      uploadDir: settings.DIAGNOSIS_IMAGE_DIR,
      maxImageBytes: Math.round(settings.DIAGNOSIS_IMAGE_MAX_MB * 1024 * 1024)
    }),
    schemes: new SchemeSearchTool(retriever, schemeIndex, settings.SCHEME_SEARCH_TOP_K)
  });

  const decisionService = new OpenAIDecisionService(client, { model: settings.AGENT_MODEL });

  const chatService = new ChatService(
    (transcript) =>
      new FarmAgent({
        decisionService,
        registry,
        thoughtSink: settings.AGENT_DEBUG ? options.thoughtSink : undefined,
        transcript
      }),
    sessionStore
  );

  return {
    chatService,
    schemeIndex,
    sessionStore,
    close() {
      sessionStore.close();
      schemeIndex.close();
    }
  };
}

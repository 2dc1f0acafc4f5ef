// Composition root: builds settings, collaborators, stores and both pipelines

import { QualityScoreAgent } from './agents/quality-score-agent.js';
import { SummarizationAgent } from './agents/summarization-agent.js';
import { TranscriptionAgent } from './agents/transcription-agent.js';
import { createTextGenerator, type TextGenerator } from './bridge/llm-client.js';
import { createEmbedder, createTranscriber, type SpeechTranscriber } from './bridge/openai-client.js';
import { AlphaVantageClient, type QuoteProvider } from './bridge/quote-client.js';
import { createConversationStores } from './config/database.js';
import { loadSettings, type AppSettings } from './config/settings.js';
import { closePool, getPool, runMigrations } from './db/pg-client.js';
import { PgVectorIndex } from './db/vector-index.js';
import {
  StaticDocumentRetriever,
  VectorDocumentRetriever,
  type DocumentRetriever,
} from './memory/knowledge-retriever.js';
import { CALL_PIPELINE_NAME, createCallPipeline, type CallPipeline } from './orchestrator/call-pipeline.js';
import {
  FINANCE_PIPELINE_NAME,
  createFinancePipeline,
  type FinancePipeline,
} from './orchestrator/finance-pipeline.js';
import type { CallRunRecord, CallState } from './types/call.js';
import { SimpleEventBus, type EventBus } from './types/events.js';
import type { FinanceRunRecord, FinanceState } from './types/finance.js';
import { createLogger, type Logger } from './utils/logger.js';

export interface PipelineApp {
  settings: AppSettings;
  finance: FinancePipeline;
  calls: CallPipeline;
  events: EventBus;
  logger: Logger;
  close(): Promise<void>;
}

/** Swaps in caller-supplied collaborators */
export interface PipelineAppOverrides {
  textGenerator?: TextGenerator;
  transcriber?: SpeechTranscriber;
  quotes?: QuoteProvider;
  retriever?: DocumentRetriever;
  logger?: Logger;
  now?: () => Date;
}

function usesPostgres(settings: AppSettings): boolean {
  return settings.storeBackend === 'postgres' || settings.rag.vectorStore === 'pg';
}

export async function createPipelineApp(
  settings: AppSettings = loadSettings(),
  overrides: PipelineAppOverrides = {},
): Promise<PipelineApp> {
  const logger = overrides.logger ?? createLogger('Pipelines', { debug: settings.debug });
  const events = new SimpleEventBus();

  if (usesPostgres(settings)) {
    await getPool(settings.pg);
    const applied = await runMigrations();
    if (applied.length > 0) logger.info('Applied migrations', { versions: applied });
  }

  const textGenerator = overrides.textGenerator ?? createTextGenerator(settings.llm, logger.child('llm'));
  const transcriber = overrides.transcriber
    ?? createTranscriber(settings.whisper.apiKey, settings.whisper.model, logger.child('whisper'));
  const quotes = overrides.quotes ?? new AlphaVantageClient(settings.quotes, logger.child('quotes'));
  const retriever = overrides.retriever ?? (settings.rag.vectorStore === 'pg'
    ? new VectorDocumentRetriever(
      createEmbedder(settings.openai.apiKey, settings.openai.embeddingModel, logger.child('embeddings')),
      new PgVectorIndex(),
      settings.rag.topK,
      logger.child('retrieval'),
    )
    : new StaticDocumentRetriever());

  const financeStores = await createConversationStores<FinanceState, FinanceRunRecord>(
    settings.storeBackend,
    FINANCE_PIPELINE_NAME,
  );
  const callStores = await createConversationStores<CallState, CallRunRecord>(
    settings.storeBackend,
    CALL_PIPELINE_NAME,
  );

  const finance = createFinancePipeline(
    { quotes, retriever, now: overrides.now },
    { ...financeStores, eventBus: events, logger },
  );

  const calls = createCallPipeline(
    {
      transcription: new TranscriptionAgent(transcriber, logger.child('transcription')),
      summarization: new SummarizationAgent(textGenerator, logger.child('summarization')),
      quality: new QualityScoreAgent(textGenerator, logger.child('quality')),
      now: overrides.now,
    },
    { ...callStores, eventBus: events, logger },
  );

  logger.debug('Pipelines ready', {
    storeBackend: settings.storeBackend,
    vectorStore: settings.rag.vectorStore,
    llm: textGenerator.available,
    whisper: transcriber.available,
  });

  return {
    settings,
    finance,
    calls,
    events,
    logger,
    async close() {
      if (usesPostgres(settings)) await closePool();
    },
  };
}

// Finance assistant and call summarizer pipelines
// Conversation-state orchestration: linear stages, merged state, checkpoints and run history

export { createPipelineApp } from './app.js';
export type { PipelineApp, PipelineAppOverrides } from './app.js';

export { ConversationPipeline, newConversationId } from './orchestrator/pipeline.js';
export type { ConversationPipelineConfig } from './orchestrator/pipeline.js';
export { mergeState, lastWriteWins, appendOnly, nextRunTimestamp } from './orchestrator/state-merge.js';
export { KeyedLock } from './orchestrator/keyed-lock.js';
export {
  FINANCE_PIPELINE_NAME,
  createFinancePipeline,
  createFinancePipelineDefinition,
} from './orchestrator/finance-pipeline.js';
export type { FinancePipeline, FinancePipelineDeps } from './orchestrator/finance-pipeline.js';
export {
  CALL_PIPELINE_NAME,
  createCallPipeline,
  createCallPipelineDefinition,
} from './orchestrator/call-pipeline.js';
export type { CallPipeline, CallPipelineDeps } from './orchestrator/call-pipeline.js';

export { AGENT_PROFILES, SPECIALIZED_ROUTING_ORDER, listAgentProfiles } from './config/agent-registry.js';
export type { AgentProfile } from './config/agent-registry.js';
export { routeQuery, extractTicker } from './config/query-router.js';
export { loadSettings } from './config/settings.js';
export type { AppSettings, StoreBackend } from './config/settings.js';
export { createConversationStores } from './config/database.js';

export { LocalCheckpointStore, LocalRunRecordStore } from './memory/conversation-store.js';
export type { CheckpointStore, RunRecordStore } from './memory/conversation-store.js';
export { PgCheckpointStore, PgRunRecordStore } from './memory/pg-conversation-store.js';
export {
  StaticDocumentRetriever,
  VectorDocumentRetriever,
  fallbackDocuments,
} from './memory/knowledge-retriever.js';
export type { DocumentRetriever } from './memory/knowledge-retriever.js';

export { AnthropicTextGenerator, UnavailableTextGenerator, createTextGenerator } from './bridge/llm-client.js';
export type { TextGenerator, ToolSpec } from './bridge/llm-client.js';
export { OpenAIEmbedder, WhisperTranscriber, createEmbedder, createTranscriber } from './bridge/openai-client.js';
export type { Embedder, SpeechTranscriber } from './bridge/openai-client.js';
export { AlphaVantageClient } from './bridge/quote-client.js';
export type { QuoteProvider } from './bridge/quote-client.js';

export { InvalidRequestError, PipelineError, ConfigError } from './utils/errors.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { FINANCE_DISCLAIMER, attachDisclaimer } from './utils/disclaimers.js';
export { FinancePayloadSchema, CallInputSchema, normalizeTranscriptText } from './utils/validation.js';
export type { FinancePayloadInput, CallPayloadInput } from './utils/validation.js';

export * from './types/index.js';

// Call summarizer pipeline: intake -> transcribe -> summarize -> quality -> finalize

import { buildCallMetadata } from '../agents/intake-agent.js';
import type { QualityScoreAgent } from '../agents/quality-score-agent.js';
import type { SummarizationAgent } from '../agents/summarization-agent.js';
import type { TranscriptionAgent } from '../agents/transcription-agent.js';
import type { CallInput, CallResult, CallRunRecord, CallState } from '../types/call.js';
import type { PipelineDefinition, Stage } from '../types/pipeline.js';
import { parseCallInput } from '../utils/validation.js';
import { ConversationPipeline, type ConversationPipelineConfig } from './pipeline.js';
import { nextRunTimestamp } from './state-merge.js';

export const CALL_PIPELINE_NAME = 'call';

export interface CallPipelineDeps {
  transcription: TranscriptionAgent;
  summarization: SummarizationAgent;
  quality: QualityScoreAgent;
  now?: () => Date;
}

export type CallPipeline = ConversationPipeline<CallInput, CallState, CallRunRecord, CallResult>;

function missing(stage: string, field: string): Error {
  return new Error(`${stage} reached without ${field}`);
}

export function createCallPipelineDefinition(
  deps: CallPipelineDeps,
): PipelineDefinition<CallInput, CallState, CallRunRecord, CallResult> {
  const now = deps.now ?? (() => new Date());

  const intake: Stage<CallState> = {
    name: 'intake',
    async run(state) {
      const rawPayload = { ...state.rawPayload, conversationId: state.conversationId };
      return {
        rawPayload,
        metadata: buildCallMetadata(rawPayload, state.conversationId, now()),
        transcript: null,
        summary: null,
        quality: null,
        result: null,
      };
    },
  };

  const transcribe: Stage<CallState> = {
    name: 'transcribe',
    async run(state) {
      return { transcript: await deps.transcription.run(state.rawPayload, state.conversationId) };
    },
  };

  const summarize: Stage<CallState> = {
    name: 'summarize',
    async run(state) {
      if (!state.transcript) throw missing('summarize', 'a transcript');
      return { summary: await deps.summarization.run(state.transcript) };
    },
  };

  const quality: Stage<CallState> = {
    name: 'quality',
    async run(state) {
      if (!state.transcript) throw missing('quality', 'a transcript');
      return { quality: await deps.quality.run(state.transcript, state.summary) };
    },
  };

  const finalize: Stage<CallState> = {
    name: 'finalize',
    async run(state) {
      const { metadata, transcript, summary, quality: score } = state;
      if (!metadata || !transcript || !summary || !score) {
        throw missing('finalize', 'a complete call analysis');
      }

      const record: CallRunRecord = {
        at: nextRunTimestamp(state.runs.at(-1)?.at, now()),
        conversationId: state.conversationId,
        agentName: metadata.agentName,
        customerName: metadata.customerName,
        channel: metadata.channel,
        summary: summary.summary,
        overall: score.overall,
      };

      return {
        result: { metadata, transcript, summary, quality: score },
        runs: [record],
      };
    },
  };

  return {
    name: CALL_PIPELINE_NAME,
    parsePayload: parseCallInput,
    conversationIdOf: payload => payload.conversationId,
    initialState: (conversationId, payload, history) => ({
      conversationId,
      rawPayload: payload,
      metadata: null,
      transcript: null,
      summary: null,
      quality: null,
      result: null,
      runs: [...history],
    }),
    stages: [intake, transcribe, summarize, quality, finalize],
  };
}

export function createCallPipeline(
  deps: CallPipelineDeps,
  config: ConversationPipelineConfig<CallState, CallRunRecord>,
): CallPipeline {
  return new ConversationPipeline(createCallPipelineDefinition(deps), config);
}

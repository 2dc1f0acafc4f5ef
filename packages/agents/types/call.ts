// Call summarizer: validated input, agent outputs, state and run records

import type { ConversationStateBase, RunRecordBase } from './pipeline.js';

export interface CallInput {
  conversationId?: string;
  agentName: string;
  customerName: string;
  audioPath: string | null;
  transcript: string | null;
  channel: string;           // voice, chat, email, ...
}

export interface CallMetadata {
  conversationId: string;
  agentName: string;
  customerName: string;
  channel: string;
  ingestedAt: string;
  hasAudio: boolean;
  hasTranscript: boolean;
}

export type TranscriptSource = 'provided' | 'text-file' | 'whisper' | 'placeholder';

export interface TranscriptPayload {
  conversationId: string;
  transcript: string;
  audioPath: string | null;
  durationSeconds: number | null;
  source: TranscriptSource;
}

export interface SummaryPayload {
  conversationId: string;
  summary: string;
  keyPoints: string[];
  risks: string[];
  followUps: string[];
}

export type QualityDimension = 'professionalism' | 'empathy' | 'resolution' | 'compliance';

export interface QualityScore extends Record<QualityDimension, number> {
  conversationId: string;
  overall: number;                  // rounded mean of the four dimensions, 1-5
  summaryFeedback: string;
  risks: string[];
  method: 'llm' | 'heuristic';
}

export interface CallResult {
  metadata: CallMetadata;
  transcript: TranscriptPayload;
  summary: SummaryPayload;
  quality: QualityScore;
}

export interface CallRunRecord extends RunRecordBase {
  readonly agentName: string;
  readonly customerName: string;
  readonly channel: string;
  readonly summary: string;
  readonly overall: number;
}

/**
 * One call-summary run. Merge policy per field:
 * - runs: append
 * - everything else: replace
 */
export interface CallState extends ConversationStateBase<CallRunRecord, CallResult> {
  rawPayload: CallInput;
  metadata: CallMetadata | null;
  transcript: TranscriptPayload | null;
  summary: SummaryPayload | null;
  quality: QualityScore | null;
}

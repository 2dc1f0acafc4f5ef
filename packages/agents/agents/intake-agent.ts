import type { CallInput, CallMetadata } from '../types/call.js';

export function buildCallMetadata(input: CallInput, conversationId: string, ingestedAt: Date): CallMetadata {
  return {
    conversationId,
    agentName: input.agentName,
    customerName: input.customerName,
    channel: input.channel,
    ingestedAt: ingestedAt.toISOString(),
    hasAudio: input.audioPath !== null,
    hasTranscript: input.transcript !== null,
  };
}

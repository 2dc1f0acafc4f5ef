// Summarization agent: LLM bullet summary with a deterministic rule-based fallback

import type { TextGenerator } from '../bridge/llm-client.js';
import type { SummaryPayload, TranscriptPayload } from '../types/call.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const SUMMARY_SYSTEM_PROMPT = 'You summarize contact center calls and return concise, factual bullets.';
export const SUMMARY_USER_PREFIX =
  'Summarize the following customer support call in four bullet points. Be concise and avoid speculation.\n\n';

const RISK_KEYWORDS = ['cancel', 'refund', 'angry', 'escalate', 'complaint'];
const FOLLOW_UP_KEYWORDS = ['follow', 'email', 'case', 'ticket', 'tomorrow', 'next week'];

/**
 * Collapse whitespace and fit `text` into `width` characters,
 * dropping whole words and appending `placeholder` when it does not fit.
 */
export function shorten(text: string, width: number, placeholder = '...'): string {
  const collapsed = text.trim().split(/\s+/).filter(Boolean).join(' ');
  if (collapsed.length <= width) return collapsed;

  let kept = '';
  for (const word of collapsed.split(' ')) {
    const next = kept ? `${kept} ${word}` : word;
    if (next.length + placeholder.length > width) break;
    kept = next;
  }
  return kept ? `${kept}${placeholder}` : placeholder.trimStart();
}

export function splitSentences(transcript: string): string[] {
  return transcript
    .split('.')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export function sentencesWithKeywords(transcript: string, keywords: readonly string[]): string[] {
  return splitSentences(transcript).filter(sentence => {
    const lower = sentence.toLowerCase();
    return keywords.some(k => lower.includes(k));
  });
}

export function fallbackSummary(transcript: string): string {
  return `Auto-generated summary (rule-based): ${shorten(transcript.replace(/\n/g, ' '), 400)}`;
}

export class SummarizationAgent {
  constructor(
    private readonly generator: TextGenerator,
    private readonly logger: Logger = silentLogger,
  ) {}

  async run(payload: TranscriptPayload): Promise<SummaryPayload> {
    const { transcript, conversationId } = payload;

    return {
      conversationId,
      summary: await this.summarize(transcript),
      keyPoints: splitSentences(transcript).slice(0, 4),
      risks: sentencesWithKeywords(transcript, RISK_KEYWORDS),
      followUps: sentencesWithKeywords(transcript, FOLLOW_UP_KEYWORDS),
    };
  }

  private async summarize(transcript: string): Promise<string> {
    if (!this.generator.available) return fallbackSummary(transcript);

    const completion = await this.generator.complete(SUMMARY_SYSTEM_PROMPT, SUMMARY_USER_PREFIX + transcript);
    if (completion.ok) return completion.value;

    this.logger.warn('LLM summary failed, using rule-based summary', { error: completion.error });
    return fallbackSummary(transcript);
  }
}

// Quality score agent: rubric scoring via a forced tool call, keyword heuristic as fallback
// The overall score is always recomputed locally from the four clamped dimensions.

import { z } from 'zod';
import type { TextGenerator, ToolSpec } from '../bridge/llm-client.js';
import type { QualityDimension, QualityScore, SummaryPayload, TranscriptPayload } from '../types/call.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_RUBRIC: Record<QualityDimension, string> = {
  professionalism: 'Tone, greeting, and courtesy standards',
  empathy: 'Understood and acknowledged customer sentiment',
  resolution: 'Clear path to resolve the issue',
  compliance: 'Adhered to disclaimers and verification',
};

const DIMENSION_KEYWORDS: Record<QualityDimension, string[]> = {
  professionalism: ['thank', 'appreciate', 'help'],
  empathy: ['sorry', 'understand', 'apologize'],
  resolution: ['resolved', 'solution', 'fixed', 'sent'],
  compliance: ['policy', 'verify', 'recorded', 'consent'],
};

const RISK_PHRASES = ['cancel', 'escalate', 'sue', 'violation', 'refund'];

export const HEURISTIC_FEEDBACK =
  'Pseudo scores based on keyword coverage. Integrate function-calling LLMs for production-quality QA.';

export const QA_SYSTEM_PROMPT =
  'You are a strict QA auditor for contact center calls. Use ONLY the provided transcript/context. ' +
  'Scores are integers 1-5. If unclear, choose 3 (neutral). Keep feedback short and cite brief evidence.';

const scoreProperty = { type: 'integer', minimum: 1, maximum: 5 };

export const QUALITY_TOOL: ToolSpec = {
  name: 'emit_quality_score',
  description:
    'Return QA rubric scores (1-5) for a customer support interaction. ' +
    'Also return short feedback and a list of risks detected.',
  inputSchema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      professionalism: scoreProperty,
      empathy: scoreProperty,
      resolution: scoreProperty,
      compliance: scoreProperty,
      summary_feedback: {
        type: 'string',
        description: '1-3 sentences. Mention brief evidence from the transcript.',
      },
      risks: {
        type: 'array',
        items: { type: 'string' },
        description: "Short phrases like 'refund request', 'escalation threat', 'compliance gap'.",
      },
    },
    required: ['professionalism', 'empathy', 'resolution', 'compliance', 'summary_feedback', 'risks'],
  },
};

const ToolOutputSchema = z.object({
  professionalism: z.number().int(),
  empathy: z.number().int(),
  resolution: z.number().int(),
  compliance: z.number().int(),
  summary_feedback: z.string().optional(),
  risks: z.array(z.unknown()).optional(),
});

export function clampScore(value: number): number {
  return Math.max(1, Math.min(5, Math.round(value)));
}

/** Round to the nearest integer, ties to the even neighbour (2.5 -> 2, 3.5 -> 4) */
export function roundHalfEven(value: number): number {
  const rounded = Math.round(value);
  const isTie = Math.abs(value % 1) === 0.5;
  return isTie && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

/** Mean of the four dimensions, rounded half to even, clamped to 1-5 */
export function overallScore(scores: Record<QualityDimension, number>): number {
  const mean = (scores.professionalism + scores.empathy + scores.resolution + scores.compliance) / 4;
  return clampScore(roundHalfEven(mean));
}

export function keywordPresenceScore(transcript: string, keywords: readonly string[]): number {
  const lower = transcript.toLowerCase();
  const matches = keywords.filter(k => lower.includes(k.toLowerCase())).length;
  return Math.min(5, Math.max(1, matches));
}

export function heuristicQualityScore(conversationId: string, transcript: string): QualityScore {
  const scores: Record<QualityDimension, number> = {
    professionalism: keywordPresenceScore(transcript, DIMENSION_KEYWORDS.professionalism),
    empathy: keywordPresenceScore(transcript, DIMENSION_KEYWORDS.empathy),
    resolution: keywordPresenceScore(transcript, DIMENSION_KEYWORDS.resolution),
    compliance: keywordPresenceScore(transcript, DIMENSION_KEYWORDS.compliance),
  };
  const lower = transcript.toLowerCase();

  return {
    conversationId,
    ...scores,
    overall: overallScore(scores),
    summaryFeedback: HEURISTIC_FEEDBACK,
    risks: RISK_PHRASES.filter(p => lower.includes(p)),
    method: 'heuristic',
  };
}

export function buildQualityPrompt(
  transcript: string,
  summary: SummaryPayload | null,
  rubric: Record<QualityDimension, string>,
): string {
  const rubricText = Object.entries(rubric).map(([k, v]) => `- ${k}: ${v}`).join('\n');
  let prompt =
    'Score this call using the rubric. Return ONLY via the tool.\n\n' +
    `Rubric:\n${rubricText}\n\n` +
    `Transcript:\n${transcript}\n`;
  if (summary?.summary) {
    prompt += `\nExisting summary (optional context):\n${summary.summary}\n`;
  }
  if (summary && summary.keyPoints.length > 0) {
    prompt += `\nKey points (optional context):\n${summary.keyPoints.map(kp => `- ${kp}`).join('\n')}\n`;
  }
  return prompt;
}

export class QualityScoreAgent {
  constructor(
    private readonly generator: TextGenerator,
    private readonly logger: Logger = silentLogger,
    private readonly rubric: Record<QualityDimension, string> = DEFAULT_RUBRIC,
  ) {}

  async run(transcript: TranscriptPayload, summary: SummaryPayload | null): Promise<QualityScore> {
    const scored = await this.scoreWithLlm(transcript, summary);
    return scored ?? heuristicQualityScore(transcript.conversationId, transcript.transcript);
  }

  private async scoreWithLlm(
    transcript: TranscriptPayload,
    summary: SummaryPayload | null,
  ): Promise<QualityScore | null> {
    if (!this.generator.available || !transcript.transcript.trim()) return null;

    const response = await this.generator.invokeTool(
      QA_SYSTEM_PROMPT,
      buildQualityPrompt(transcript.transcript, summary, this.rubric),
      QUALITY_TOOL,
    );
    if (!response.ok) {
      this.logger.warn('LLM QA scoring failed, using keyword heuristic', { error: response.error });
      return null;
    }

    const parsed = ToolOutputSchema.safeParse(response.value);
    if (!parsed.success) {
      this.logger.warn('LLM QA output malformed, using keyword heuristic', {
        issues: parsed.error.issues.map(i => i.message),
      });
      return null;
    }

    const data = parsed.data;
    const scores: Record<QualityDimension, number> = {
      professionalism: clampScore(data.professionalism),
      empathy: clampScore(data.empathy),
      resolution: clampScore(data.resolution),
      compliance: clampScore(data.compliance),
    };

    return {
      conversationId: transcript.conversationId,
      ...scores,
      overall: overallScore(scores),
      summaryFeedback: data.summary_feedback?.trim() || 'LLM QA scoring completed.',
      risks: (data.risks ?? []).map(r => String(r).trim()).filter(r => r.length > 0),
      method: 'llm',
    };
  }
}

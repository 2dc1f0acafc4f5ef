// Payload validation: wire payloads are snake_case, internal shapes camelCase

import { existsSync, statSync } from 'node:fs';
import { z } from 'zod';
import { InvalidRequestError } from './errors.js';
import type { CallInput } from '../types/call.js';
import type { FinancePayload } from '../types/finance.js';

/** Trim each line, drop blank ones, join with newlines */
export function normalizeTranscriptText(text: string): string {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}

/** Absent, null and blank ids all mean "assign a fresh one" */
const OptionalConversationId = z.preprocess(
  v => (typeof v === 'string' ? v.trim() || undefined : (v ?? undefined)),
  z.string().optional(),
);

export const FinancePayloadSchema = z
  .object({
    conversation_id: OptionalConversationId,
    // an empty question is routed like any other and lands on the general agent
    query: z
      .string()
      .nullish()
      .transform(q => (q ?? '').trim()),
  })
  .transform((raw): FinancePayload => ({
    conversationId: raw.conversation_id,
    query: raw.query,
  }));

export const CallInputSchema = z
  .object({
    conversation_id: OptionalConversationId,
    agent_name: z.string().trim().min(1, 'agent_name must not be empty'),
    customer_name: z.string().trim().min(1, 'customer_name must not be empty'),
    audio_path: z.string().trim().nullish(),
    transcript: z.string().nullish(),
    channel: z.string().trim().min(1).default('voice'),
  })
  .transform((raw): CallInput => {
    const transcript = raw.transcript ? normalizeTranscriptText(raw.transcript) : '';
    return {
      conversationId: raw.conversation_id,
      agentName: raw.agent_name,
      customerName: raw.customer_name,
      audioPath: raw.audio_path ? raw.audio_path : null,
      transcript: transcript.length > 0 ? transcript : null,
      channel: raw.channel,
    };
  })
  .superRefine((input, ctx) => {
    if (input.audioPath === null && input.transcript === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Either an audio_path or transcript must be supplied.',
      });
    }
  });

export type FinancePayloadInput = z.input<typeof FinancePayloadSchema>;
export type CallPayloadInput = z.input<typeof CallInputSchema>;

/** Parse with a zod schema, converting failures to InvalidRequestError */
export function parseOrThrow<T>(pipeline: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw InvalidRequestError.fromZod(pipeline, parsed.error);
  }
  return parsed.data;
}

/** Throws InvalidRequestError unless `path` names an existing regular file */
export function ensureFile(path: string, field = 'audio_path'): void {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new InvalidRequestError('Invalid call request', [`${field}: file not found: ${path}`]);
  }
}

export function parseFinancePayload(raw: unknown): FinancePayload {
  return parseOrThrow('finance', FinancePayloadSchema, raw);
}

/**
 * Validate a call payload. A missing audio file is only fatal when
 * there is no transcript to fall back on.
 */
export function parseCallInput(raw: unknown): CallInput {
  const input = parseOrThrow('call', CallInputSchema, raw);
  if (input.audioPath !== null && input.transcript === null) {
    ensureFile(input.audioPath);
  }
  return input;
}

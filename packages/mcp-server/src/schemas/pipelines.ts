import { z } from "zod";

export const PipelineNameSchema = z
  .enum(["finance", "call"])
  .describe("Which pipeline's conversations to read: finance assistant or call summarizer");

export const ConversationIdSchema = z
  .string()
  .min(1)
  .describe("Conversation identifier returned in a previous result's metadata (conv-...)");

export const FinanceAskSchema = z.object({
  query: z.string().min(1).describe("Free-text finance question, e.g. 'What is the price of IBM?'"),
  conversation_id: ConversationIdSchema.optional(),
});

export const CallSummarizeSchema = z.object({
  agent_name: z.string().min(1).describe("Name of the contact center agent on the call"),
  customer_name: z.string().min(1).describe("Name of the customer on the call"),
  transcript: z.string().optional().describe("Call transcript text; one utterance per line"),
  audio_path: z
    .string()
    .optional()
    .describe("Path to a recording on the server host; .txt files are read as transcripts"),
  channel: z.string().optional().describe("Contact channel: voice (default), chat, email, ..."),
  conversation_id: ConversationIdSchema.optional(),
});

export const ConversationLookupSchema = z.object({
  pipeline: PipelineNameSchema,
  conversation_id: ConversationIdSchema,
});

export const ListConversationsSchema = z.object({
  pipeline: PipelineNameSchema,
});

export const ListAgentsSchema = z.object({});

export type FinanceAskInput = z.infer<typeof FinanceAskSchema>;
export type CallSummarizeInput = z.infer<typeof CallSummarizeSchema>;
export type ConversationLookupInput = z.infer<typeof ConversationLookupSchema>;
export type ListConversationsInput = z.infer<typeof ListConversationsSchema>;

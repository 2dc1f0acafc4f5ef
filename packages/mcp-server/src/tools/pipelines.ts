import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { listAgentProfiles, type PipelineApp } from "@pipelines/agents";
import {
  CallSummarizeSchema,
  ConversationLookupSchema,
  FinanceAskSchema,
  ListAgentsSchema,
  ListConversationsSchema,
  type CallSummarizeInput,
  type ConversationLookupInput,
  type FinanceAskInput,
  type ListConversationsInput,
} from "../schemas/pipelines.js";
import { wrapError, wrapResponse, type ToolResponse } from "../formatters/response.js";

export interface PipelineToolHandlers {
  financeAsk(params: FinanceAskInput): Promise<ToolResponse>;
  callSummarize(params: CallSummarizeInput): Promise<ToolResponse>;
  conversationRuns(params: ConversationLookupInput): Promise<ToolResponse>;
  conversationLatestResult(params: ConversationLookupInput): Promise<ToolResponse>;
  listConversations(params: ListConversationsInput): Promise<ToolResponse>;
  listFinanceAgents(): Promise<ToolResponse>;
}

export function createToolHandlers(app: Pick<PipelineApp, "finance" | "calls">): PipelineToolHandlers {
  const pipelineFor = (name: "finance" | "call") => (name === "finance" ? app.finance : app.calls);

  return {
    async financeAsk(params) {
      try {
        return wrapResponse(await app.finance.run(params));
      } catch (err) {
        return wrapError(err);
      }
    },

    async callSummarize(params) {
      try {
        return wrapResponse(await app.calls.run(params));
      } catch (err) {
        return wrapError(err);
      }
    },

    async conversationRuns(params) {
      const runs = await pipelineFor(params.pipeline).getRuns(params.conversation_id);
      return wrapResponse({ conversation_id: params.conversation_id, runs });
    },

    async conversationLatestResult(params) {
      const result = await pipelineFor(params.pipeline).getLatestResult(params.conversation_id);
      return wrapResponse({ conversation_id: params.conversation_id, found: result !== null, result });
    },

    async listConversations(params) {
      return wrapResponse({ conversations: await pipelineFor(params.pipeline).listConversations() });
    },

    async listFinanceAgents() {
      return wrapResponse({ agents: listAgentProfiles() });
    },
  };
}

export function registerPipelineTools(server: McpServer, app: Pick<PipelineApp, "finance" | "calls">) {
  const handlers = createToolHandlers(app);

  server.tool(
    "finance_ask",
    "Ask the finance assistant an educational question. Ticker questions ('price of IBM', '$AAPL') return an Alpha Vantage quote card; other questions are routed to a specialised agent (tax, portfolio, news, goals, market, or general Q&A) and answered with learning resources. Every answer carries an educational disclaimer. Pass conversation_id to continue a conversation.",
    FinanceAskSchema.shape,
    async (params) => handlers.financeAsk(FinanceAskSchema.parse(params))
  );

  server.tool(
    "call_summarize",
    "Summarize and quality-score a customer support call. Supply a transcript or an audio_path. Returns call metadata, the normalized transcript, a summary with key points, risks and follow-ups, and rubric scores (professionalism, empathy, resolution, compliance, overall 1-5).",
    CallSummarizeSchema.shape,
    async (params) => handlers.callSummarize(CallSummarizeSchema.parse(params))
  );

  server.tool(
    "conversation_runs",
    "List the run records of one conversation in insertion order. Unknown ids return an empty list.",
    ConversationLookupSchema.shape,
    async (params) => handlers.conversationRuns(ConversationLookupSchema.parse(params))
  );

  server.tool(
    "conversation_latest_result",
    "Return the most recent result of a conversation without re-running the pipeline. found=false when the id is unknown.",
    ConversationLookupSchema.shape,
    async (params) => handlers.conversationLatestResult(ConversationLookupSchema.parse(params))
  );

  server.tool(
    "list_conversations",
    "List the most recent run record of every conversation for a pipeline, newest first.",
    ListConversationsSchema.shape,
    async (params) => handlers.listConversations(ListConversationsSchema.parse(params))
  );

  server.tool(
    "list_finance_agents",
    "List the finance assistant's agents with their descriptions, responsibilities, routing keywords, output formats and safety notes.",
    ListAgentsSchema.shape,
    async () => handlers.listFinanceAgents()
  );
}

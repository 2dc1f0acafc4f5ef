import { InvalidRequestError } from "@pipelines/agents";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function wrapResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Invalid requests come back as tool errors carrying the validation issues.
 * Anything else is rethrown for the SDK to report.
 */
export function wrapError(err: unknown): ToolResponse {
  if (err instanceof InvalidRequestError) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: err.message, issues: err.issues }) }],
      isError: true,
    };
  }
  throw err;
}

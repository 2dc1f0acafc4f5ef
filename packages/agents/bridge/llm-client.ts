// Text generation bridge: Anthropic Messages API behind a small interface
// Every call resolves to a Result; callers fall back on `ok: false`.

import Anthropic from '@anthropic-ai/sdk';
import type { LlmSettings } from '../config/settings.js';
import { errorMessage, fail, ok, type Result } from '../types/result.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: Anthropic.Tool['input_schema'];
}

export interface TextGenerator {
  readonly available: boolean;
  complete(systemPrompt: string, userPrompt: string): Promise<Result<string>>;
  /** Force a single tool call and return its raw input */
  invokeTool(systemPrompt: string, userPrompt: string, tool: ToolSpec): Promise<Result<unknown>>;
}

/** Stand-in used when no API key is configured */
export class UnavailableTextGenerator implements TextGenerator {
  readonly available = false;

  constructor(private readonly reason = 'ANTHROPIC_API_KEY is not set') {}

  async complete(): Promise<Result<string>> {
    return fail(this.reason);
  }

  async invokeTool(): Promise<Result<unknown>> {
    return fail(this.reason);
  }
}

const MAX_TOKENS = 1024;

export class AnthropicTextGenerator implements TextGenerator {
  readonly available = true;
  private readonly client: Anthropic;

  constructor(
    private readonly settings: LlmSettings & { apiKey: string },
    private readonly logger: Logger = silentLogger,
    client?: Anthropic,
  ) {
    this.client = client ?? new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 1,
    });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<Result<string>> {
    try {
      const response = await this.client.messages.create({
        model: this.settings.model,
        max_tokens: MAX_TOKENS,
        temperature: this.settings.temperature,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
      });

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      return text ? ok(text) : fail('Empty completion');
    } catch (err) {
      this.logger.warn('Completion failed', { model: this.settings.model, error: errorMessage(err) });
      return fail(errorMessage(err));
    }
  }

  async invokeTool(systemPrompt: string, userPrompt: string, tool: ToolSpec): Promise<Result<unknown>> {
    try {
      const response = await this.client.messages.create({
        model: this.settings.model,
        max_tokens: MAX_TOKENS,
        temperature: 0,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        tools: [{ name: tool.name, description: tool.description, input_schema: tool.inputSchema }],
        tool_choice: { type: 'tool', name: tool.name },
      });

      for (const block of response.content) {
        if (block.type === 'tool_use' && block.name === tool.name) {
          return ok(block.input);
        }
      }
      return fail(`Model did not call ${tool.name}`);
    } catch (err) {
      this.logger.warn('Tool call failed', { tool: tool.name, error: errorMessage(err) });
      return fail(errorMessage(err));
    }
  }
}

export function createTextGenerator(settings: LlmSettings, logger?: Logger): TextGenerator {
  const { apiKey } = settings;
  if (!apiKey) return new UnavailableTextGenerator();
  return new AnthropicTextGenerator({ ...settings, apiKey }, logger);
}

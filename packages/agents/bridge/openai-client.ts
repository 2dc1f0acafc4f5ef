// OpenAI bridge: embeddings for retrieval, Whisper for audio transcription

import { createReadStream } from 'node:fs';
import OpenAI from 'openai';
import { errorMessage, fail, ok, type Result } from '../types/result.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface Embedder {
  readonly available: boolean;
  embed(texts: string[]): Promise<Result<number[][]>>;
}

export interface SpeechTranscriber {
  readonly available: boolean;
  transcribe(audioPath: string): Promise<Result<string>>;
}

export class UnavailableEmbedder implements Embedder {
  readonly available = false;

  async embed(): Promise<Result<number[][]>> {
    return fail('OPENAI_API_KEY is not set');
  }
}

export class UnavailableTranscriber implements SpeechTranscriber {
  readonly available = false;

  async transcribe(): Promise<Result<string>> {
    return fail('WHISPER_API_KEY is not set');
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly available = true;
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly logger: Logger = silentLogger,
    client?: OpenAI,
  ) {
    this.client = client ?? new OpenAI({ apiKey });
  }

  async embed(texts: string[]): Promise<Result<number[][]>> {
    if (texts.length === 0) return ok([]);
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: texts });
      return ok(response.data.map(item => item.embedding));
    } catch (err) {
      this.logger.warn('Embedding request failed', { model: this.model, error: errorMessage(err) });
      return fail(errorMessage(err));
    }
  }
}

export class WhisperTranscriber implements SpeechTranscriber {
  readonly available = true;
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly logger: Logger = silentLogger,
    client?: OpenAI,
  ) {
    this.client = client ?? new OpenAI({ apiKey });
  }

  async transcribe(audioPath: string): Promise<Result<string>> {
    try {
      const response = await this.client.audio.transcriptions.create({
        file: createReadStream(audioPath),
        model: this.model,
      });
      const text = response.text.trim();
      return text ? ok(text) : fail('Empty transcription');
    } catch (err) {
      this.logger.warn('Transcription failed', { audioPath, error: errorMessage(err) });
      return fail(errorMessage(err));
    }
  }
}

export function createEmbedder(apiKey: string | undefined, model: string, logger?: Logger): Embedder {
  return apiKey ? new OpenAIEmbedder(apiKey, model, logger) : new UnavailableEmbedder();
}

export function createTranscriber(apiKey: string | undefined, model: string, logger?: Logger): SpeechTranscriber {
  return apiKey ? new WhisperTranscriber(apiKey, model, logger) : new UnavailableTranscriber();
}

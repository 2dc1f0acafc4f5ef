// Transcription agent: provided transcript, .txt recording, Whisper, or a labelled placeholder

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { SpeechTranscriber } from '../bridge/openai-client.js';
import type { CallInput, TranscriptPayload } from '../types/call.js';
import { errorMessage, fail, ok, type Result } from '../types/result.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { normalizeTranscriptText } from '../utils/validation.js';

export function placeholderTranscript(audioPath: string): string {
  return `Transcription placeholder for ${basename(audioPath)}. Configure WHISPER_API_KEY to transcribe audio.`;
}

async function readTextRecording(path: string): Promise<Result<string>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (err) {
    return fail(`Could not read ${path}: ${errorMessage(err)}`);
  }
}

export class TranscriptionAgent {
  constructor(
    private readonly transcriber: SpeechTranscriber,
    private readonly logger: Logger = silentLogger,
  ) {}

  async run(input: CallInput, conversationId: string): Promise<TranscriptPayload> {
    const base = { conversationId, audioPath: input.audioPath, durationSeconds: null };

    if (input.transcript !== null) {
      return { ...base, transcript: normalizeTranscriptText(input.transcript), source: 'provided' };
    }

    const audioPath = input.audioPath;
    if (audioPath === null) {
      throw new Error('No transcript or audio payload available for transcription.');
    }

    const isTextRecording = extname(audioPath).toLowerCase() === '.txt';
    const transcribed = isTextRecording
      ? await readTextRecording(audioPath)
      : await this.transcriber.transcribe(audioPath);
    if (transcribed.ok) {
      const source = isTextRecording ? 'text-file' : 'whisper';
      return { ...base, transcript: normalizeTranscriptText(transcribed.value), source };
    }

    this.logger.warn('Transcription unavailable, using placeholder', { audioPath, error: transcribed.error });
    return { ...base, transcript: placeholderTranscript(audioPath), source: 'placeholder' };
  }
}

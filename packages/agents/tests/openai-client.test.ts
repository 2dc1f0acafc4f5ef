import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockEmbeddings } = vi.hoisted(() => ({ mockEmbeddings: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    embeddings = { create: mockEmbeddings };
  },
}));

describe('OpenAIEmbedder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns one vector per input text', async () => {
    const { OpenAIEmbedder } = await import('../bridge/openai-client.js');
    mockEmbeddings.mockResolvedValueOnce({ data: [{ embedding: [0.1, 0.2] }, { embedding: [0.3, 0.4] }] });

    const result = await new OpenAIEmbedder('test-secret', 'text-embedding-3-small').embed(['a', 'b']);

    expect(result).toEqual({ ok: true, value: [[0.1, 0.2], [0.3, 0.4]] });
    expect(mockEmbeddings).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['a', 'b'] });
  });

  it('skips the API for an empty batch', async () => {
    const { OpenAIEmbedder } = await import('../bridge/openai-client.js');
    expect(await new OpenAIEmbedder('test-secret', 'm').embed([])).toEqual({ ok: true, value: [] });
    expect(mockEmbeddings).not.toHaveBeenCalled();
  });

  it('reports API failures as a Result', async () => {
    const { OpenAIEmbedder } = await import('../bridge/openai-client.js');
    mockEmbeddings.mockRejectedValueOnce(new Error('401 Incorrect API key provided'));

    expect(await new OpenAIEmbedder('test-secret', 'm').embed(['a'])).toEqual({
      ok: false,
      error: '401 Incorrect API key provided',
    });
  });
});

describe('factories', () => {
  it('fall back to unavailable collaborators without a key', async () => {
    const { createEmbedder, createTranscriber } = await import('../bridge/openai-client.js');

    const embedder = createEmbedder(undefined, 'm');
    const transcriber = createTranscriber(undefined, 'whisper-1');

    expect(embedder.available).toBe(false);
    expect(await embedder.embed(['a'])).toEqual({ ok: false, error: 'OPENAI_API_KEY is not set' });
    expect(transcriber.available).toBe(false);
    expect(await transcriber.transcribe('/calls/a.wav')).toEqual({ ok: false, error: 'WHISPER_API_KEY is not set' });
  });

  it('build OpenAI-backed collaborators with a key', async () => {
    const { OpenAIEmbedder, WhisperTranscriber, createEmbedder, createTranscriber } = await import(
      '../bridge/openai-client.js'
    );
    expect(createEmbedder('test-secret', 'm')).toBeInstanceOf(OpenAIEmbedder);
    expect(createTranscriber('test-secret', 'whisper-1')).toBeInstanceOf(WhisperTranscriber);
  });
});

// Knowledge retrieval for finance answers
// Vector search (OpenAI embeddings + pgvector) when configured; seed-article fallback otherwise.
// retrieve() always returns at least one document.

import type { Embedder } from '../bridge/openai-client.js';
import type { VectorIndex } from '../db/vector-index.js';
import { SEED_ARTICLES } from '../data/knowledge-base.js';
import type { RetrievedDocument } from '../types/finance.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const SNIPPET_LENGTH = 200;

export interface DocumentRetriever {
  retrieve(query: string): Promise<RetrievedDocument[]>;
}

/** Collapse newlines and cut to SNIPPET_LENGTH characters plus "..." */
export function toSnippet(text: string): string {
  const flat = text.trim().replace(/\n/g, ' ');
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH)}...` : flat;
}

export function fallbackDocuments(): RetrievedDocument[] {
  return SEED_ARTICLES.map(a => ({ title: a.title, url: a.url, summary: toSnippet(a.content) }));
}

export class StaticDocumentRetriever implements DocumentRetriever {
  async retrieve(): Promise<RetrievedDocument[]> {
    return fallbackDocuments();
  }
}

export class VectorDocumentRetriever implements DocumentRetriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    private readonly topK: number,
    private readonly logger: Logger = silentLogger,
  ) {}

  async retrieve(query: string): Promise<RetrievedDocument[]> {
    if (!query.trim()) return fallbackDocuments();

    const embedded = await this.embedder.embed([query]);
    if (!embedded.ok) {
      this.logger.warn('Embedding unavailable, using seed articles', { error: embedded.error });
      return fallbackDocuments();
    }

    const [vector] = embedded.value;
    if (!vector) return fallbackDocuments();

    const hits = await this.index.query(vector, this.topK);
    if (!hits.ok) {
      this.logger.warn('Vector search failed, using seed articles', { error: hits.error });
      return fallbackDocuments();
    }
    if (hits.value.length === 0) return fallbackDocuments();

    return hits.value.map(hit => ({
      title: hit.title || 'Untitled',
      url: hit.url,
      summary: toSnippet(hit.content),
    }));
  }
}

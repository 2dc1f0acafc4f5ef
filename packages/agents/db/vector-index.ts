// pgvector-backed similarity index over the knowledge_documents table

import { queryWithRetry, toVectorLiteral } from './pg-client.js';
import { errorMessage, fail, ok, type Result } from '../types/result.js';

export interface VectorHit {
  id: string;
  title: string;
  url: string;
  content: string;
  similarity: number;
}

export interface IndexedDocument {
  id: string;
  title: string;
  category: string;
  url: string;
  content: string;
  embedding: number[];
}

export interface VectorIndex {
  query(vector: number[], k: number): Promise<Result<VectorHit[]>>;
  upsert(documents: IndexedDocument[]): Promise<Result<number>>;
}

export class PgVectorIndex implements VectorIndex {
  async query(vector: number[], k: number): Promise<Result<VectorHit[]>> {
    try {
      const { rows } = await queryWithRetry<{
        id: string;
        title: string;
        url: string;
        content: string;
        similarity: number;
      }>(
        `SELECT id, title, url, content, 1 - (embedding <=> $1::vector) AS similarity
           FROM knowledge_documents
          ORDER BY embedding <=> $1::vector
          LIMIT $2`,
        [toVectorLiteral(vector), k],
      );
      return ok(rows.map(r => ({ ...r, similarity: Number(r.similarity) })));
    } catch (err) {
      return fail(errorMessage(err));
    }
  }

  async upsert(documents: IndexedDocument[]): Promise<Result<number>> {
    try {
      for (const doc of documents) {
        await queryWithRetry(
          `INSERT INTO knowledge_documents (id, title, category, url, content, embedding)
           VALUES ($1, $2, $3, $4, $5, $6::vector)
           ON CONFLICT (id) DO UPDATE
              SET title = EXCLUDED.title,
                  category = EXCLUDED.category,
                  url = EXCLUDED.url,
                  content = EXCLUDED.content,
                  embedding = EXCLUDED.embedding,
                  updated_at = now()`,
          [doc.id, doc.title, doc.category, doc.url, doc.content, toVectorLiteral(doc.embedding)],
        );
      }
      return ok(documents.length);
    } catch (err) {
      return fail(errorMessage(err));
    }
  }
}

#!/usr/bin/env tsx
// Embed the seed articles and upsert them into knowledge_documents (pgvector)
import 'dotenv/config';
import { OpenAIEmbedder } from '../bridge/openai-client.js';
import { loadSettings } from '../config/settings.js';
import { SEED_ARTICLES, seedDocumentId } from '../data/knowledge-base.js';
import { closePool, getPool, runMigrations } from '../db/pg-client.js';
import { PgVectorIndex } from '../db/vector-index.js';
import { createLogger } from '../utils/logger.js';

async function main(): Promise<void> {
  const settings = loadSettings();
  const logger = createLogger('Ingest', { debug: settings.debug });

  if (!settings.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is required to embed the knowledge base.');
  }

  await getPool(settings.pg);
  const applied = await runMigrations();
  if (applied.length > 0) logger.info('Applied migrations', { versions: applied });

  const embedder = new OpenAIEmbedder(settings.openai.apiKey, settings.openai.embeddingModel, logger);
  const embedded = await embedder.embed(SEED_ARTICLES.map(a => a.content));
  if (!embedded.ok) throw new Error(`Embedding failed: ${embedded.error}`);

  const documents = SEED_ARTICLES.map((article, i) => ({
    id: seedDocumentId(article),
    title: article.title,
    category: article.category,
    url: article.url,
    content: article.content,
    embedding: embedded.value[i] ?? [],
  }));

  const upserted = await new PgVectorIndex().upsert(documents);
  if (!upserted.ok) throw new Error(`Upsert failed: ${upserted.error}`);

  console.log(
    `[ok] Ingested/updated ${upserted.value} docs into knowledge_documents ` +
    `on ${settings.pg.host}:${settings.pg.port} (embedder=${settings.openai.embeddingModel})`,
  );
}

try {
  await main();
} finally {
  await closePool();
}

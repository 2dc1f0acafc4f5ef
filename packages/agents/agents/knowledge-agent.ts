import type { DocumentRetriever } from '../memory/knowledge-retriever.js';
import type { RetrievedDocument } from '../types/finance.js';
import { attachDisclaimer } from '../utils/disclaimers.js';

export function formatResourceAnswer(docs: readonly RetrievedDocument[]): string {
  const bullets = docs.map(d => `- ${d.title}: ${d.summary} (${d.url})`).join('\n');
  return attachDisclaimer(`Here are learning resources related to your question:\n${bullets}`);
}

export class KnowledgeAgent {
  constructor(private readonly retriever: DocumentRetriever) {}

  async run(query: string): Promise<{ docs: RetrievedDocument[]; answer: string }> {
    const docs = await this.retriever.retrieve(query);
    return { docs, answer: formatResourceAnswer(docs) };
  }
}

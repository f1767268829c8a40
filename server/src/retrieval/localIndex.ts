import { readFile } from 'node:fs/promises';
import MiniSearch, { type SearchResult } from 'minisearch';
import { KnowledgeBaseError, errorReason } from '../errors';
import type { IndexHealth, KnowledgeDocument, KnowledgeIndex, ScoredDocument } from './types';

type SearchableDoc = {
  id: string;
  source: string;
  text: string;
};

const SEARCH_OPTIONS = {
  fuzzy: 0.2,
  prefix: true,
  boost: { source: 2 }
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const parseDocument = (raw: unknown, position: number): KnowledgeDocument => {
  if (!isRecord(raw)) {
    throw new KnowledgeBaseError(`Knowledge base document #${position} must be an object.`);
  }

  const { id, source, text, metadata } = raw;
  if (typeof source !== 'string' || !source.trim()) {
    throw new KnowledgeBaseError(`Knowledge base document #${position} is missing a source.`);
  }
  if (typeof text !== 'string' || !text.trim()) {
    throw new KnowledgeBaseError(`Knowledge base document #${position} is missing text.`);
  }

  return {
    id: typeof id === 'string' && id.trim() ? id.trim() : `doc-${position}`,
    source: source.trim(),
    text: text.trim(),
    metadata: isRecord(metadata) ? metadata : {}
  };
};

export const parseKnowledgeDocuments = (raw: unknown): KnowledgeDocument[] => {
  const list = isRecord(raw) ? raw.documents : raw;
  if (!Array.isArray(list)) {
    throw new KnowledgeBaseError('Knowledge base file must contain a documents array.');
  }

  return list.map((item, position) => parseDocument(item, position));
};

export class LocalKnowledgeIndex implements KnowledgeIndex {
  private readonly index = new MiniSearch<SearchableDoc>({
    fields: ['source', 'text'],
    storeFields: ['id'],
    searchOptions: SEARCH_OPTIONS
  });
  private readonly documents = new Map<string, KnowledgeDocument>();

  constructor(documents: KnowledgeDocument[]) {
    for (const document of documents) {
      if (this.documents.has(document.id)) {
        throw new KnowledgeBaseError(`Duplicate knowledge base document id: ${document.id}`);
      }
      this.documents.set(document.id, document);
    }

    this.index.addAll(documents.map(({ id, source, text }) => ({ id, source, text })));
  }

  async query(text: string, k: number, signal?: AbortSignal): Promise<ScoredDocument[]> {
    if (signal?.aborted) {
      throw new KnowledgeBaseError('Knowledge base query aborted.');
    }

    const results: SearchResult[] = this.index.search(text);
    const limited = results.slice(0, Math.max(0, k));
    const maxScore = limited.length > 0 ? limited[0].score : 1;

    const scored: ScoredDocument[] = [];
    for (const result of limited) {
      const document = this.documents.get(String(result.id));
      if (!document) continue;
      scored.push({
        source: document.source,
        text: document.text,
        score: maxScore > 0 ? result.score / maxScore : 0,
        metadata: document.metadata
      });
    }

    return scored;
  }

  async health(): Promise<IndexHealth> {
    return {
      healthy: this.documents.size > 0,
      documents: this.documents.size,
      ...(this.documents.size === 0 ? { error: 'Knowledge base is empty.' } : {})
    };
  }
}

/**
 * Defers reading the corpus until the first query, so a missing or broken
 * file degrades retrieval instead of preventing startup.
 */
export class FileKnowledgeIndex implements KnowledgeIndex {
  private loading: Promise<LocalKnowledgeIndex> | null = null;

  constructor(private readonly path: string) {}

  private load(): Promise<LocalKnowledgeIndex> {
    if (!this.loading) {
      this.loading = readFile(this.path, 'utf8')
        .then((raw) => new LocalKnowledgeIndex(parseKnowledgeDocuments(JSON.parse(raw))))
        .catch((error: unknown) => {
          this.loading = null;
          if (error instanceof KnowledgeBaseError) throw error;
          throw new KnowledgeBaseError('Knowledge base could not be loaded.', {
            path: this.path,
            reason: errorReason(error)
          });
        });
    }

    return this.loading;
  }

  async query(text: string, k: number, signal?: AbortSignal): Promise<ScoredDocument[]> {
    const index = await this.load();
    return index.query(text, k, signal);
  }

  async health(): Promise<IndexHealth> {
    try {
      const index = await this.load();
      return await index.health();
    } catch (error) {
      return { healthy: false, error: errorReason(error) };
    }
  }
}

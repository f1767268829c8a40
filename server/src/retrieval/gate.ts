import { KnowledgeBaseError, errorReason } from '../errors';
import type { Logger } from '../logger';
import type { CitationPayload } from '../types';
import { DEFAULT_RETRIEVAL_KEYWORDS } from './config';
import type {
  KnowledgeBaseHealth,
  KnowledgeIndex,
  RetrievalResult,
  ScoredDocument,
  SearchResult
} from './types';

const CONTEXT_DOC_CHARS = 800;
const SNIPPET_CHARS = 500;
const SEARCH_CONTENT_CHARS = 1000;

export interface RetrievalGateOptions {
  index: KnowledgeIndex;
  keywords?: string[];
  maxContextChars?: number;
  logger?: Logger;
}

const truncateWithEllipsis = (value: string, maxChars: number): string => {
  return value.length > maxChars ? `${value.slice(0, maxChars)}...` : value;
};

export const toCitation = (document: ScoredDocument): CitationPayload => ({
  source: document.source,
  snippet: truncateWithEllipsis(document.text, SNIPPET_CHARS)
});

export const buildContext = (documents: ScoredDocument[], maxContextChars: number): string => {
  const context = documents
    .map((document) => `Source: ${document.source}\n${document.text.slice(0, CONTEXT_DOC_CHARS)}`)
    .join('\n\n');

  return context.slice(0, Math.max(0, maxContextChars));
};

const emptyResult = (flags: { degraded: boolean; skipped: boolean }): RetrievalResult => ({
  citations: [],
  context: '',
  ...flags
});

export class RetrievalGate {
  private readonly index: KnowledgeIndex;
  private readonly keywords: string[];
  private readonly maxContextChars: number;
  private readonly logger?: Logger;

  constructor(options: RetrievalGateOptions) {
    this.index = options.index;
    this.keywords = (options.keywords ?? DEFAULT_RETRIEVAL_KEYWORDS).map((keyword) => keyword.toLowerCase());
    this.maxContextChars = options.maxContextChars ?? 4000;
    this.logger = options.logger;
  }

  shouldRetrieve(query: string): boolean {
    const normalized = query.toLowerCase();
    return this.keywords.some((keyword) => normalized.includes(keyword));
  }

  /** Never throws for index failures; the result is flagged as degraded instead. */
  async retrieve(query: string, k: number, signal?: AbortSignal, logger = this.logger): Promise<RetrievalResult> {
    try {
      const documents = await this.index.query(query, k, signal);
      return {
        citations: documents.map(toCitation),
        context: buildContext(documents, this.maxContextChars),
        degraded: false,
        skipped: false
      };
    } catch (error) {
      if (signal?.aborted) throw error;
      const failure = error instanceof KnowledgeBaseError ? error : new KnowledgeBaseError(errorReason(error));
      logger?.warn('retrieval.degraded', {
        error_type: failure.type,
        reason: failure.message
      });
      return emptyResult({ degraded: true, skipped: false });
    }
  }

  async maybeRetrieve(query: string, k: number, signal?: AbortSignal, logger = this.logger): Promise<RetrievalResult> {
    if (!this.shouldRetrieve(query)) {
      return emptyResult({ degraded: false, skipped: true });
    }

    return this.retrieve(query, k, signal, logger);
  }

  async search(query: string, k: number, signal?: AbortSignal): Promise<SearchResult> {
    let documents: ScoredDocument[];
    try {
      documents = await this.index.query(query, k, signal);
    } catch (error) {
      if (error instanceof KnowledgeBaseError) throw error;
      throw new KnowledgeBaseError('Knowledge base search failed.', { reason: errorReason(error) });
    }

    return {
      documents: documents.map((document) => ({
        source: document.source,
        content: truncateWithEllipsis(document.text, SEARCH_CONTENT_CHARS),
        score: document.score,
        metadata: document.metadata
      })),
      citations: documents.map(toCitation)
    };
  }

  async health(): Promise<KnowledgeBaseHealth> {
    try {
      const indexHealth = await this.index.health();
      return {
        status: indexHealth.healthy ? 'healthy' : 'unhealthy',
        degraded: !indexHealth.healthy,
        ...(indexHealth.documents !== undefined ? { documents: indexHealth.documents } : {}),
        ...(indexHealth.error ? { error: indexHealth.error } : {})
      };
    } catch (error) {
      return { status: 'unhealthy', degraded: true, error: errorReason(error) };
    }
  }
}

import type { CitationPayload } from '../types';

export interface KnowledgeDocument {
  id: string;
  source: string;
  text: string;
  metadata: Record<string, unknown>;
}

export interface ScoredDocument {
  source: string;
  text: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface IndexHealth {
  healthy: boolean;
  documents?: number;
  error?: string;
}

export interface KnowledgeIndex {
  query: (text: string, k: number, signal?: AbortSignal) => Promise<ScoredDocument[]>;
  health: () => Promise<IndexHealth>;
}

export interface RetrievalResult {
  citations: CitationPayload[];
  context: string;
  degraded: boolean;
  skipped: boolean;
}

export interface SearchDocument {
  source: string;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface SearchResult {
  documents: SearchDocument[];
  citations: CitationPayload[];
}

export interface KnowledgeBaseHealth {
  status: 'healthy' | 'unhealthy';
  degraded: boolean;
  documents?: number;
  error?: string;
}

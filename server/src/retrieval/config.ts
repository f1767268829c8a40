import { fileURLToPath } from 'node:url';
import { parseIntBounded } from '../aiConfig';
import type { Env } from '../types';

export const DEFAULT_RETRIEVAL_KEYWORDS = [
  'article',
  'section',
  'regulation',
  'requirement',
  'gdpr',
  'compliance',
  'legal',
  'specific',
  'exact'
];

export const DEFAULT_KNOWLEDGE_BASE_PATH = fileURLToPath(new URL('../../data/knowledge-base.json', import.meta.url));

export interface RetrievalRuntimeConfig {
  k: number;
  maxContextChars: number;
  keywords: string[];
  knowledgeBasePath: string;
}

const parseKeywords = (raw: string | undefined): string[] => {
  const keywords = (raw || '')
    .split(',')
    .map((keyword) => keyword.trim().toLowerCase())
    .filter(Boolean);

  return keywords.length > 0 ? keywords : DEFAULT_RETRIEVAL_KEYWORDS;
};

export const getRetrievalRuntimeConfig = (env: Env): RetrievalRuntimeConfig => {
  return {
    k: parseIntBounded(env.RETRIEVAL_K, 3, 1, 20),
    maxContextChars: parseIntBounded(env.RETRIEVAL_MAX_CONTEXT_CHARS, 4000, 200, 50000),
    keywords: parseKeywords(env.RETRIEVAL_KEYWORDS),
    knowledgeBasePath: env.KNOWLEDGE_BASE_PATH?.trim() || DEFAULT_KNOWLEDGE_BASE_PATH
  };
};

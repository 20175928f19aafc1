/**
 * INPUT: none
 * OUTPUT: embedding index and cache artifact types
 * POS: data model layer, shared by embedding providers, the cache store and the semantic retriever
 */

import { Language } from './types';

/** Vectors of one rule, one per language */
export interface EmbeddingEntry {
  ruleId: string;
  vectors: Record<Language, number[]>;
}

/** Read-only index built once per process */
export interface EmbeddingIndex {
  provider: string;
  dimensions: number;
  corpusHash: string;
  entries: ReadonlyMap<string, EmbeddingEntry>;
}

/** On-disk cache layout */
export interface EmbeddingCacheFile {
  version: number;
  corpusHash: string;
  provider: string;
  dimensions: number;
  createdAt: string;
  entries: EmbeddingEntry[];
}

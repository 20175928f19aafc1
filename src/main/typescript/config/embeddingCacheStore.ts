/**
 * INPUT: data/cache/embedding-index.json
 * OUTPUT: load() → EmbeddingIndex | null, save(index) → boolean
 * POS: config layer, best-effort persistence of the embedding index; never throws
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { EmbeddingCacheFile, EmbeddingEntry, EmbeddingIndex } from '../models/embedding';
import { LANGUAGES } from '../models/types';
import { isRecord } from '../utils/validators';
import { RuleCorpus } from './ruleCorpus';

export const CACHE_FORMAT_VERSION = 1;

/** Cache key: corpus content plus the provider that produced the vectors */
export function computeCorpusHash(corpus: RuleCorpus, providerId: string): string {
  return crypto.createHash('sha256').update(corpus.fingerprint()).update('\u0000').update(providerId).digest('hex');
}

export interface CacheExpectation {
  corpusHash: string;
  provider: string;
  dimensions: number;
}

function isVector(value: unknown, dimensions: number): value is number[] {
  return Array.isArray(value) && value.length === dimensions && value.every((x) => typeof x === 'number');
}

function parseEntry(raw: unknown, dimensions: number): EmbeddingEntry | null {
  if (!isRecord(raw)) return null;
  const ruleId = raw['ruleId'];
  const vectors = raw['vectors'];
  if (typeof ruleId !== 'string' || !isRecord(vectors)) return null;
  const fr = vectors['fr'];
  const en = vectors['en'];
  if (!isVector(fr, dimensions) || !isVector(en, dimensions)) return null;
  return { ruleId, vectors: { fr, en } };
}

export class EmbeddingCacheStore {
  constructor(private readonly filePath: string) {}

  /** null when the file is absent, unreadable, malformed or stale */
  load(expected: CacheExpectation): EmbeddingIndex | null {
    if (!fs.existsSync(this.filePath)) {
      console.log(`[embeddingCache] no cache at ${this.filePath}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      console.warn(`[embeddingCache] unreadable cache, recomputing:`, err);
      return null;
    }

    const rawEntries = isRecord(parsed) ? parsed['entries'] : undefined;
    if (!isRecord(parsed) || parsed['version'] !== CACHE_FORMAT_VERSION || !Array.isArray(rawEntries)) {
      console.warn('[embeddingCache] malformed cache, recomputing');
      return null;
    }
    if (
      parsed['corpusHash'] !== expected.corpusHash ||
      parsed['provider'] !== expected.provider ||
      parsed['dimensions'] !== expected.dimensions
    ) {
      console.log('[embeddingCache] stale cache (corpus or provider changed), recomputing');
      return null;
    }

    const entries = new Map<string, EmbeddingEntry>();
    for (const raw of rawEntries) {
      const entry = parseEntry(raw, expected.dimensions);
      if (!entry) {
        console.warn('[embeddingCache] malformed entry, recomputing');
        return null;
      }
      entries.set(entry.ruleId, entry);
    }

    console.log(`[embeddingCache] loaded ${entries.size} entries (${LANGUAGES.length} languages each)`);
    return { ...expected, entries };
  }

  save(index: EmbeddingIndex): boolean {
    const file: EmbeddingCacheFile = {
      version: CACHE_FORMAT_VERSION,
      corpusHash: index.corpusHash,
      provider: index.provider,
      dimensions: index.dimensions,
      createdAt: new Date().toISOString(),
      entries: [...index.entries.values()],
    };
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(file), 'utf-8');
      console.log(`[embeddingCache] saved ${file.entries.length} entries to ${this.filePath}`);
      return true;
    } catch (err) {
      console.error('[embeddingCache] save failed, continuing without cache:', err);
      return false;
    }
  }
}

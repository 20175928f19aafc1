/**
 * INPUT: RuleCorpus, EmbeddingProvider, optional EmbeddingCacheStore
 * OUTPUT: EmbeddingIndex (or null when the provider is unavailable)
 * POS: service layer, builds the per-rule, per-language vectors once per process
 */

import { computeCorpusHash, EmbeddingCacheStore } from '../config/embeddingCacheStore';
import { RuleCorpus } from '../config/ruleCorpus';
import { EmbeddingEntry, EmbeddingIndex } from '../models/embedding';
import { Language, LANGUAGES, RuleRecord } from '../models/types';
import { EmbeddingProvider } from './embeddingProvider';

/** Text embedded for one rule side: title, body, keywords, variations */
export function ruleEmbeddingText(rule: RuleRecord, language: Language): string {
  const t = rule.text[language];
  return [t.title, t.content, t.keywords.join(' '), t.variations.join(' ')].join('\n');
}

export async function buildEmbeddingIndex(
  corpus: RuleCorpus,
  provider: EmbeddingProvider,
  corpusHash: string,
): Promise<EmbeddingIndex> {
  const rules = [...corpus.getAllRules().values()];
  const texts = rules.flatMap((rule) => LANGUAGES.map((lang) => ruleEmbeddingText(rule, lang)));
  const vectors = await provider.embed(texts);

  if (vectors.length !== texts.length) {
    throw new Error(`provider returned ${vectors.length} vectors for ${texts.length} texts`);
  }
  const wrong = vectors.find((v) => v.length !== provider.dimensions);
  if (wrong) {
    throw new Error(`provider returned a ${wrong.length}-dim vector, expected ${provider.dimensions}`);
  }

  const entries = new Map<string, EmbeddingEntry>();
  rules.forEach((rule, i) => {
    entries.set(rule.id, {
      ruleId: rule.id,
      vectors: { fr: vectors[i * 2], en: vectors[i * 2 + 1] },
    });
  });
  return { provider: provider.id, dimensions: provider.dimensions, corpusHash, entries };
}

/**
 * Single-flight initialization: concurrent callers share one pending build.
 * Cache hit → cached index; miss → compute and save; provider failure → null.
 */
export class EmbeddingIndexInitializer {
  private pending: Promise<EmbeddingIndex | null> | null = null;

  constructor(
    private readonly corpus: RuleCorpus,
    private readonly provider: EmbeddingProvider,
    private readonly store: EmbeddingCacheStore | null = null,
  ) {}

  initialize(): Promise<EmbeddingIndex | null> {
    if (!this.pending) this.pending = this.build();
    return this.pending;
  }

  private async build(): Promise<EmbeddingIndex | null> {
    const corpusHash = computeCorpusHash(this.corpus, this.provider.id);
    const cached = this.store?.load({
      corpusHash,
      provider: this.provider.id,
      dimensions: this.provider.dimensions,
    });
    if (cached && cached.entries.size === this.corpus.size) return cached;

    const started = Date.now();
    try {
      const index = await buildEmbeddingIndex(this.corpus, this.provider, corpusHash);
      console.log(`[embeddingIndex] built ${index.entries.size} entries with ${this.provider.id} in ${Date.now() - started}ms`);
      this.store?.save(index);
      return index;
    } catch (err) {
      console.error(`[embeddingIndex] ${this.provider.id} unavailable, semantic search disabled:`, err);
      return null;
    }
  }
}

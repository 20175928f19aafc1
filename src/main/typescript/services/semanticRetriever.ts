/**
 * INPUT: NormalizedQuery (+ the text to embed), EmbeddingIndex
 * OUTPUT: top-K Match list, score = cosine + keyword boost + pattern boost + variation boost
 * POS: service layer, ranked retrieval over the rule corpus
 */

import { RuleCorpus } from '../config/ruleCorpus';
import { MatchType } from '../models/enums';
import { EmbeddingIndex } from '../models/embedding';
import { Lexicon } from '../models/lexicon';
import { Match, NormalizedQuery, RuleRecord } from '../models/types';
import { cosineSimilarity } from '../utils/vectorMath';
import { EmbeddingProvider } from './embeddingProvider';
import { SimilarityScorer } from './similarity';

export interface RetrieverOptions {
  topK: number;
  /** weight of a rule keyword hit without an explicit boost in the lexicon */
  defaultKeywordWeight: number;
  maxKeywordBoost: number;
  patternBoost: number;
  /** variation boost = weight × best token-sort ratio, when that ratio reaches the floor */
  variationWeight: number;
  variationFloor: number;
}

export const DEFAULT_RETRIEVER_OPTIONS: Readonly<RetrieverOptions> = {
  topK: 3,
  defaultKeywordWeight: 0.3,
  maxKeywordBoost: 0.9,
  patternBoost: 0.5,
  variationWeight: 0.2,
  variationFloor: 0.6,
};

export class SemanticRetriever {
  private readonly options: RetrieverOptions;

  constructor(
    private readonly corpus: RuleCorpus,
    private readonly index: EmbeddingIndex,
    private readonly provider: EmbeddingProvider,
    private readonly lexicon: Lexicon,
    private readonly scorer: SimilarityScorer,
    options: Partial<RetrieverOptions> = {},
  ) {
    this.options = { ...DEFAULT_RETRIEVER_OPTIONS, ...options };
  }

  /** Ranks every rule for `text` (defaults to the normalized query); ties keep corpus order */
  async rank(query: NormalizedQuery, text: string = query.normalized): Promise<Match[]> {
    const [queryVector] = await this.provider.embed([text]);
    if (!queryVector) return [];
    const raw = query.original.toLowerCase();

    const scored: Array<Match & { order: number }> = [];
    let order = 0;
    for (const rule of this.corpus.getAllRules().values()) {
      const entry = this.index.entries.get(rule.id);
      order++;
      if (!entry) continue;
      const score =
        cosineSimilarity(queryVector, entry.vectors[query.language]) +
        this.keywordBoost(rule, query) +
        this.patternBoost(rule, query, raw) +
        this.variationBoost(rule, query, text);
      scored.push({ ruleId: rule.id, score, type: MatchType.SEMANTIC, order });
    }

    scored.sort((a, b) => b.score - a.score || a.order - b.order);
    return scored.slice(0, this.options.topK).map(({ ruleId, score, type }) => ({ ruleId, score, type }));
  }

  keywordBoost(rule: RuleRecord, query: NormalizedQuery): number {
    const ruleKeywords = rule.text[query.language].keywords;
    const weights = this.lexicon.languages[query.language].keywordBoosts;
    let boost = 0;
    for (const keyword of query.keywords) {
      if (ruleKeywords.includes(keyword)) {
        boost += weights.get(keyword) ?? this.options.defaultKeywordWeight;
      }
    }
    return Math.min(boost, this.options.maxKeywordBoost);
  }

  patternBoost(rule: RuleRecord, query: NormalizedQuery, raw: string): number {
    return rule.text[query.language].patterns.some((p) => p.test(raw)) ? this.options.patternBoost : 0;
  }

  variationBoost(rule: RuleRecord, query: NormalizedQuery, text: string): number {
    let best = 0;
    for (const variation of rule.text[query.language].variations) {
      best = Math.max(best, this.scorer.tokenSortRatio(text, variation));
    }
    return best >= this.options.variationFloor ? this.options.variationWeight * best : 0;
  }
}

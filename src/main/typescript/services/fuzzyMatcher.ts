/**
 * INPUT: query text + language
 * OUTPUT: best Match over every (variation, rule) pair above the threshold, or null
 * POS: service layer, last-resort matcher for near-canonical phrasings
 */

import { RuleCorpus } from '../config/ruleCorpus';
import { MatchType } from '../models/enums';
import { Language, Match } from '../models/types';
import { SimilarityScorer } from './similarity';

interface VariationPair {
  variation: string;
  ruleId: string;
}

export class FuzzyMatcher {
  private readonly pairs: Readonly<Record<Language, readonly VariationPair[]>>;

  constructor(
    corpus: RuleCorpus,
    private readonly scorer: SimilarityScorer,
    private readonly threshold = 0.7,
  ) {
    const build = (lang: Language): VariationPair[] =>
      [...corpus.getAllRules().values()].flatMap((rule) =>
        rule.text[lang].variations.map((variation) => ({ variation, ruleId: rule.id })),
      );
    this.pairs = { fr: build('fr'), en: build('en') };
  }

  /** Strictly above the threshold; ties keep the first pair */
  match(text: string, language: Language): Match | null {
    let best: Match | null = null;
    try {
      for (const { variation, ruleId } of this.pairs[language]) {
        const score = this.scorer.tokenSortRatio(text, variation);
        if (score > this.threshold && (!best || score > best.score)) {
          best = { ruleId, score, type: MatchType.FUZZY };
        }
      }
    } catch (err) {
      console.error(`[fuzzyMatcher] ${this.scorer.id} failed:`, err);
      return null;
    }
    return best;
  }
}

/**
 * INPUT: raw query text + language
 * OUTPUT: NormalizedQuery (lowercased, typo-corrected, synonym-expanded)
 * POS: service layer, first stage of the query pipeline; pure, no I/O
 */

import { Lexicon, LanguageLexicon } from '../models/lexicon';
import { Language, NormalizedQuery } from '../models/types';
import { SimilarityScorer } from './similarity';

/** Synonyms appended per recognized canonical term */
const SYNONYMS_PER_TERM = 2;
/** Upper bound on appended synonyms per query */
const MAX_APPENDED_SYNONYMS = 10;

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((t) => t.replace(EDGE_PUNCTUATION, ''))
    .filter((t) => t.length > 0);
}

export class QueryNormalizer {
  private readonly synonymTerms: Record<Language, ReadonlySet<string>>;

  constructor(
    private readonly lexicon: Lexicon,
    private readonly scorer: SimilarityScorer,
    private readonly typoThreshold = 0.8,
  ) {
    const collect = (lex: LanguageLexicon): Set<string> =>
      new Set([...lex.synonyms.values()].flat());
    this.synonymTerms = {
      fr: collect(lexicon.languages.fr),
      en: collect(lexicon.languages.en),
    };
  }

  normalize(raw: string, language: Language): NormalizedQuery {
    const lex = this.lexicon.languages[language];
    const corrected = tokenize(raw).map((token) => this.correctTypo(token, lex, language));
    const tokens = this.expandSynonyms(corrected, lex);

    return {
      original: raw,
      language,
      normalized: tokens.join(' '),
      keywords: new Set(tokens),
    };
  }

  /** Canonical term with the best similarity at or above the threshold; ties keep the first */
  private correctTypo(token: string, lex: LanguageLexicon, language: Language): string {
    if (lex.typoVariants.has(token) || this.synonymTerms[language].has(token)) return token;
    if (!/\p{L}/u.test(token)) return token;

    let best: string | null = null;
    let bestScore = 0;
    for (const [canonical, variants] of lex.typoVariants) {
      for (const variant of variants) {
        const score = this.scorer.ratio(token, variant);
        if (score > bestScore) {
          bestScore = score;
          best = canonical;
        }
      }
    }
    return best !== null && bestScore >= this.typoThreshold ? best : token;
  }

  private expandSynonyms(tokens: string[], lex: LanguageLexicon): string[] {
    const seen = new Set(tokens);
    const appended: string[] = [];

    for (const token of tokens) {
      const synonyms = lex.synonyms.get(token);
      if (!synonyms) continue;
      for (const synonym of synonyms.slice(0, SYNONYMS_PER_TERM)) {
        if (appended.length >= MAX_APPENDED_SYNONYMS) return [...tokens, ...appended];
        if (seen.has(synonym)) continue;
        seen.add(synonym);
        appended.push(synonym);
      }
    }
    return [...tokens, ...appended];
  }
}

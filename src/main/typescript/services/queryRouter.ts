/**
 * INPUT: raw question + language + recent user context
 * OUTPUT: QueryOutcome (answer text, intent, producing stage, cache flag)
 * POS: service layer, orchestrates pattern matcher → semantic retriever → fuzzy matcher → fallback
 *
 * Every stage failure is absorbed here: the caller always gets a non-empty answer.
 */

import { IntentLabel, MatchType } from '../models/enums';
import { Lexicon } from '../models/lexicon';
import { HandEvaluation, Language, Match, NormalizedQuery, QueryOutcome } from '../models/types';
import { LruCache } from '../core/lruCache';
import { FuzzyMatcher } from './fuzzyMatcher';
import { evaluateHand } from './handEvaluator';
import { classifyIntent, classifyWithContext } from './intentClassifier';
import { PatternMatcher } from './patternMatcher';
import { QueryNormalizer } from './queryNormalizer';
import { ResponseComposer } from './responseComposer';
import { SemanticRetriever } from './semanticRetriever';

/** Below this top score the raw query is ranked as well */
const RAW_RETRY_SCORE = 0.4;

export interface QueryRouterDeps {
  lexicon: Lexicon;
  normalizer: QueryNormalizer;
  patternMatcher: PatternMatcher;
  /** null when no embedding index is available */
  retriever: SemanticRetriever | null;
  fuzzyMatcher: FuzzyMatcher;
  composer: ResponseComposer;
  cache: LruCache<string, Omit<QueryOutcome, 'cached'>>;
}

export class QueryRouter {
  constructor(private readonly deps: QueryRouterDeps) {}

  get semanticEnabled(): boolean {
    return this.deps.retriever !== null;
  }

  async processQuery(raw: string, language: Language, recentContext: readonly string[] = []): Promise<QueryOutcome> {
    const { composer, cache } = this.deps;
    const text = raw.trim();
    if (!text) {
      return { answer: composer.fallback(IntentLabel.GENERAL, language), intent: IntentLabel.GENERAL, matchType: null, cached: false };
    }

    const key = `${language}:${text.toLowerCase()}`;
    const hit = cache.get(key);
    if (hit) {
      console.log(`[queryRouter] cache hit: ${key.slice(0, 40)}`);
      return { ...hit, cached: true };
    }

    try {
      const { outcome, cacheable } = await this.route(text, language, recentContext);
      if (cacheable) cache.set(key, outcome);
      return { ...outcome, cached: false };
    } catch (err) {
      console.error('[queryRouter] query failed, answering with apology:', err);
      return { answer: composer.apology(language), intent: IntentLabel.GENERAL, matchType: null, cached: false };
    }
  }

  evaluateHand(description: string, language: Language): HandEvaluation {
    return evaluateHand(description, language);
  }

  suggestions(language: Language): readonly string[] {
    return this.deps.composer.suggestions(language);
  }

  // ─── Stages ───────────────────────────────────────────────────

  private async route(
    text: string,
    language: Language,
    recentContext: readonly string[],
  ): Promise<{ outcome: Omit<QueryOutcome, 'cached'>; cacheable: boolean }> {
    const { normalizer, patternMatcher, fuzzyMatcher, composer, lexicon } = this.deps;
    const query = normalizer.normalize(text, language);
    const intent = classifyIntent(text, lexicon.languages[language]);

    const patternHit = patternMatcher.match(query);
    if (patternHit) {
      console.log(`[queryRouter] pattern ${patternHit.kind}${patternHit.points ? ` (${patternHit.points})` : ''}`);
      return {
        outcome: { answer: patternHit.response, intent: patternHit.intent, matchType: MatchType.PATTERN },
        cacheable: true,
      };
    }

    const ranked = await this.rankSafely(query);
    const semantic = ranked.length > 0 ? composer.composeRanked(ranked, language) : null;
    if (semantic) {
      console.log(`[queryRouter] semantic ${ranked[0].ruleId} score=${ranked[0].score.toFixed(3)}`);
      return { outcome: { answer: semantic, intent, matchType: MatchType.SEMANTIC }, cacheable: true };
    }

    const fuzzy = fuzzyMatcher.match(query.normalized, language) ?? fuzzyMatcher.match(text, language);
    const fuzzyAnswer = fuzzy ? composer.renderRule(fuzzy.ruleId, language) : null;
    if (fuzzy && fuzzyAnswer) {
      console.log(`[queryRouter] fuzzy ${fuzzy.ruleId} score=${fuzzy.score.toFixed(3)}`);
      return { outcome: { answer: fuzzyAnswer, intent, matchType: MatchType.FUZZY }, cacheable: true };
    }

    const resolved = classifyWithContext(text, recentContext, lexicon.languages[language]);
    console.log(`[queryRouter] fallback ${resolved.intent}${resolved.fromContext ? ' (from context)' : ''}`);
    return {
      outcome: { answer: composer.fallback(resolved.intent, language), intent: resolved.intent, matchType: null },
      cacheable: !resolved.fromContext,
    };
  }

  /** Normalized query first; the raw text as well when the best score is weak */
  private async rankSafely(query: NormalizedQuery): Promise<Match[]> {
    const { retriever } = this.deps;
    if (!retriever) return [];
    try {
      const ranked = await retriever.rank(query);
      const best = ranked[0]?.score ?? 0;
      if (best >= RAW_RETRY_SCORE) return ranked;

      const raw = query.original.toLowerCase();
      if (raw === query.normalized) return ranked;
      const rawRanked = await retriever.rank(query, raw);
      return (rawRanked[0]?.score ?? 0) > best ? rawRanked : ranked;
    } catch (err) {
      console.error('[queryRouter] semantic search failed, continuing without it:', err);
      return [];
    }
  }
}

/**
 * INPUT: AppConfig (data files, embedding provider, similarity backend, thresholds)
 * OUTPUT: processQuery / evaluateHand backed by a lazily built, process-wide QueryRouter
 * POS: service layer, wiring of the query pipeline; the API routers and the LINE handler call this module
 */

import { AppConfig, getAppConfig } from '../config/appConfig';
import { EmbeddingCacheStore } from '../config/embeddingCacheStore';
import { loadLexicon } from '../config/lexicon';
import { loadResponseTemplates } from '../config/responseTemplates';
import { loadRuleCorpus } from '../config/ruleCorpus';
import { LruCache } from '../core/lruCache';
import { HandEvaluation, Language, QueryOutcome } from '../models/types';
import { EmbeddingIndexInitializer } from './embeddingIndex';
import { EmbeddingProvider, HashingEmbeddingProvider, OpenAiEmbeddingProvider } from './embeddingProvider';
import { FuzzyMatcher } from './fuzzyMatcher';
import { evaluateHand as evaluateHandText } from './handEvaluator';
import { PatternMatcher } from './patternMatcher';
import { QueryNormalizer } from './queryNormalizer';
import { QueryRouter } from './queryRouter';
import { ResponseComposer } from './responseComposer';
import { SemanticRetriever } from './semanticRetriever';
import { createSimilarityScorer } from './similarity';

export interface QueryRouterOverrides {
  provider?: EmbeddingProvider;
  /** null disables the on-disk cache */
  cacheStore?: EmbeddingCacheStore | null;
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  if (config.embedding.provider === 'openai') {
    return new OpenAiEmbeddingProvider({
      apiKey: config.embedding.openAiApiKey,
      model: config.embedding.openAiModel,
    });
  }
  return new HashingEmbeddingProvider();
}

/** Loads data files (throws on malformed data), builds the index, assembles the router */
export async function buildQueryRouter(config: AppConfig, overrides: QueryRouterOverrides = {}): Promise<QueryRouter> {
  const corpus = loadRuleCorpus(config.files.rules);
  const lexicon = loadLexicon(config.files.lexicon);
  const templates = loadResponseTemplates(config.files.responses);
  const scorer = createSimilarityScorer(config.similarityBackend);
  const { thresholds } = config;

  const provider = overrides.provider ?? createEmbeddingProvider(config);
  const store = overrides.cacheStore === undefined
    ? new EmbeddingCacheStore(config.files.embeddingCache)
    : overrides.cacheStore;
  const index = await new EmbeddingIndexInitializer(corpus, provider, store).initialize();

  const composer = new ResponseComposer(corpus, templates, thresholds);
  console.log(`[queryService] router ready (similarity=${scorer.id}, semantic=${index ? provider.id : 'off'})`);

  return new QueryRouter({
    lexicon,
    normalizer: new QueryNormalizer(lexicon, scorer, thresholds.typo),
    patternMatcher: new PatternMatcher(lexicon, composer, scorer),
    retriever: index ? new SemanticRetriever(corpus, index, provider, lexicon, scorer) : null,
    fuzzyMatcher: new FuzzyMatcher(corpus, scorer, thresholds.fuzzy),
    composer,
    cache: new LruCache(config.queryCache.size, config.queryCache.ttlMs),
  });
}

// ─── Process-wide router ──────────────────────────────────────

let routerPromise: Promise<QueryRouter> | null = null;

/** Single-flight: concurrent first calls share one build */
export function getQueryRouter(): Promise<QueryRouter> {
  if (!routerPromise) {
    routerPromise = buildQueryRouter(getAppConfig()).catch((err: unknown) => {
      routerPromise = null;
      throw err;
    });
  }
  return routerPromise;
}

export async function processQuery(
  question: string,
  language: Language,
  recentContext: readonly string[] = [],
): Promise<QueryOutcome> {
  const router = await getQueryRouter();
  return router.processQuery(question, language, recentContext);
}

export function evaluateHand(description: string, language: Language): HandEvaluation {
  return evaluateHandText(description, language);
}

/** Localized suggested questions for quick replies */
export async function getSuggestions(language: Language): Promise<readonly string[]> {
  const router = await getQueryRouter();
  return router.suggestions(language);
}

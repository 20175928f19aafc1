/**
 * SemanticRetriever — cosine plus keyword, pattern and variation boosts
 */

import { loadLexicon } from '../config/lexicon';
import { MatchType } from '../models/enums';
import { buildEmbeddingIndex } from '../services/embeddingIndex';
import { SemanticRetriever } from '../services/semanticRetriever';
import { IndelScorer } from '../services/similarity';
import { dataFile, makeConstantProvider, makeCorpus, makeQuery, makeRule } from './fixtures';

const lexicon = loadLexicon(dataFile('lexicon.json'));

const corpus = makeCorpus([
  makeRule('alpha', 'bonus', { keywords: ['belote', 'rebelote', 'king', 'queen'], variations: ['zzz'] }),
  makeRule('bravo', 'scoring', { keywords: ['bonus'], patterns: ['\\bbonus\\b'] }),
  makeRule('charlie', 'capot', { keywords: ['sweep'], variations: ['how many points is a capot worth'] }),
]);

async function makeRetriever(topK?: number): Promise<SemanticRetriever> {
  const provider = makeConstantProvider();
  const index = await buildEmbeddingIndex(corpus, provider, 'hash');
  return new SemanticRetriever(corpus, index, provider, lexicon, new IndelScorer(), topK ? { topK } : {});
}

describe('SemanticRetriever.rank', () => {
  test('equal scores keep corpus order', async () => {
    const retriever = await makeRetriever();
    const matches = await retriever.rank(makeQuery('xq'));
    expect(matches.map((m) => m.ruleId)).toEqual(['alpha', 'bravo', 'charlie']);
    expect(matches.every((m) => m.type === MatchType.SEMANTIC)).toBe(true);
    expect(matches[0].score).toBeCloseTo(1, 10);
  });

  test('keyword boost is capped', async () => {
    const retriever = await makeRetriever();
    const [top] = await retriever.rank(makeQuery('belote rebelote king queen'));
    expect(top.ruleId).toBe('alpha');
    // 0.6 + 0.6 + 0.4 + 0.4 capped at 0.9
    expect(top.score).toBeCloseTo(1.9, 10);
  });

  test('unlisted keywords use the default weight and patterns add their boost', async () => {
    const retriever = await makeRetriever();
    const [top] = await retriever.rank(makeQuery('bonus'));
    expect(top.ruleId).toBe('bravo');
    expect(top.score).toBeCloseTo(1 + 0.3 + 0.5, 10);
  });

  test('a matching variation adds weight × ratio', async () => {
    const retriever = await makeRetriever();
    const [top] = await retriever.rank(makeQuery('how many points is a capot worth'));
    expect(top.ruleId).toBe('charlie');
    expect(top.score).toBeCloseTo(1.2, 10);
  });

  test('topK limits the result list', async () => {
    const retriever = await makeRetriever(2);
    expect(await retriever.rank(makeQuery('xq'))).toHaveLength(2);
  });

  test('ranking is deterministic', async () => {
    const retriever = await makeRetriever();
    const query = makeQuery('bonus points for belote');
    expect(await retriever.rank(query)).toEqual(await retriever.rank(query));
  });

  test('rules missing from the index are skipped', async () => {
    const provider = makeConstantProvider();
    const full = await buildEmbeddingIndex(corpus, provider, 'hash');
    const entries = new Map(full.entries);
    entries.delete('alpha');
    const retriever = new SemanticRetriever(corpus, { ...full, entries }, provider, lexicon, new IndelScorer());
    const matches = await retriever.rank(makeQuery('xq'));
    expect(matches.map((m) => m.ruleId)).toEqual(['bravo', 'charlie']);
  });
});

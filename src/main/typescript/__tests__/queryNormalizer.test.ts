/**
 * QueryNormalizer — typo correction, synonym expansion, bounded growth
 */

import * as path from 'path';
import { loadLexicon } from '../config/lexicon';
import { QueryNormalizer, tokenize } from '../services/queryNormalizer';
import { FuzzballScorer, IndelScorer } from '../services/similarity';

const lexicon = loadLexicon(path.resolve(process.cwd(), 'data/lexicon.json'));

describe('tokenize', () => {
  test('lowercases and strips edge punctuation', () => {
    expect(tokenize('  Quand annoncer 120 ?  ')).toEqual(['quand', 'annoncer', '120']);
  });

  test("keeps inner apostrophes", () => {
    expect(tokenize("J'ai Valet, 9")).toEqual(["j'ai", 'valet', '9']);
  });
});

describe('QueryNormalizer', () => {
  const normalizer = new QueryNormalizer(lexicon, new IndelScorer());

  test('corrects typos to the canonical term and appends two synonyms per term', () => {
    const q = normalizer.normalize('Recomandation pour 110 pointz', 'fr');
    expect(q.normalized).toBe('recommandation pour 110 points conseil suggestion score pts');
    expect(q.original).toBe('Recomandation pour 110 pointz');
    expect(q.language).toBe('fr');
    expect(q.keywords.has('recommandation')).toBe(true);
    expect(q.keywords.has('conseil')).toBe(true);
  });

  test('leaves unknown words and numbers alone', () => {
    const q = normalizer.normalize('combien vaut 250', 'fr');
    expect(q.normalized).toBe('combien vaut 250');
  });

  test('normalizing twice gives the same keyword set', () => {
    const once = normalizer.normalize('Recomandation pour 110 pointz', 'fr');
    const twice = normalizer.normalize(once.normalized, 'fr');
    expect([...twice.keywords].sort()).toEqual([...once.keywords].sort());
    expect(twice.normalized).toBe(once.normalized);
  });

  test('caps appended synonyms at 10', () => {
    const q = normalizer.normalize(
      'announce recommendation rule official trump belote points hand team contract capot',
      'en',
    );
    const tokens = q.normalized.split(' ');
    expect(tokens).toHaveLength(21);
    expect(tokens.slice(11)).toEqual([
      'say', 'declare', 'advice', 'suggestion', 'law', 'principle', 'authentic', 'legal', 'atout', 'triomphe',
    ]);
  });

  test('fuzzball backend corrects the same misspelling', () => {
    const q = new QueryNormalizer(lexicon, new FuzzballScorer()).normalize('belotte', 'en');
    expect(q.normalized.startsWith('belote')).toBe(true);
  });
});

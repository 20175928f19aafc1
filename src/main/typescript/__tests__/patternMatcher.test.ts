/**
 * PatternMatcher — priority order, point extraction, responder cues
 */

import * as path from 'path';
import { DEFAULT_THRESHOLDS } from '../config/appConfig';
import { loadLexicon } from '../config/lexicon';
import { loadResponseTemplates } from '../config/responseTemplates';
import { loadRuleCorpus } from '../config/ruleCorpus';
import { AnnouncementResponder, IntentLabel, PatternKind } from '../models/enums';
import { ANNOUNCEMENTS, Language } from '../models/types';
import { PatternMatcher, patternText } from '../services/patternMatcher';
import { QueryNormalizer } from '../services/queryNormalizer';
import { ResponseComposer } from '../services/responseComposer';
import { IndelScorer, SimilarityScorer } from '../services/similarity';
import { makeQuery } from './fixtures';

const dataFile = (name: string): string => path.resolve(process.cwd(), 'data', name);
const lexicon = loadLexicon(dataFile('lexicon.json'));
const corpus = loadRuleCorpus(dataFile('rules.json'));
const composer = new ResponseComposer(corpus, loadResponseTemplates(dataFile('responses.json')), DEFAULT_THRESHOLDS);
const normalizer = new QueryNormalizer(lexicon, new IndelScorer());
const matcher = new PatternMatcher(lexicon, composer, new IndelScorer());

function match(text: string, language: Language) {
  return matcher.match(normalizer.normalize(text, language));
}

describe('PatternMatcher — announcement points', () => {
  test.each(ANNOUNCEMENTS.map((p) => [p]))('recommendation for %i points (fr/en)', (points) => {
    const fr = match(`recommandation pour ${points} points`, 'fr');
    const en = match(`recommendation for ${points} points`, 'en');
    for (const hit of [fr, en]) {
      expect(hit?.kind).toBe(PatternKind.ANNOUNCEMENT_POINTS);
      expect(hit?.points).toBe(points);
      expect(hit?.responder).toBe(AnnouncementResponder.RECOMMENDATION);
      expect(hit?.response).toContain(String(points));
    }
  });

  test.each([[95], [150], [1100]])('%i is not an announcement and falls through', (points) => {
    expect(match(`recommandation pour ${points} points`, 'fr')).toBeNull();
    expect(match(`recommendation for ${points} points`, 'en')).toBeNull();
  });

  test('"quand" selects the conditions responder', () => {
    const hit = match('Quand annoncer 120 ?', 'fr');
    expect(hit?.responder).toBe(AnnouncementResponder.CONDITIONS);
    expect(hit?.response.startsWith('**Quand annoncer 120 points:**')).toBe(true);
  });

  test('"when" selects the conditions responder', () => {
    const hit = match('When should I announce 130', 'en');
    expect(hit?.responder).toBe(AnnouncementResponder.CONDITIONS);
    expect(hit?.response.startsWith('**When to announce 130 points:**')).toBe(true);
  });
});

describe('PatternMatcher — other families', () => {
  test('hand description asking what to announce → hand evaluation', () => {
    const hit = match("J'ai Valet, 9, As et 10 de carreau, que dois-je annoncer?", 'fr');
    expect(hit?.kind).toBe(PatternKind.HAND_EVALUATION);
    expect(hit?.points).toBe(110);
    expect(hit?.response).toContain('**Recommandation officielle:** 110 points');
  });

  test('belote/rebelote phrasing returns the belote rule', () => {
    const hit = match('Comment utiliser belote rebelote?', 'fr');
    expect(hit?.kind).toBe(PatternKind.BELOTE_REBELOTE);
    expect(hit?.response.startsWith('**👑 Belote et Rebelote Officiel**')).toBe(true);
  });

  test('coinche phrasing returns the coinche rule', () => {
    const hit = match('what is a coinche?', 'en');
    expect(hit?.kind).toBe(PatternKind.COINCHE);
    expect(hit?.response.startsWith('**⚔️ Official Coinche and Surcoinche**')).toBe(true);
  });

  test('capot phrasing returns the capot rule', () => {
    const hit = match("c'est quoi un capot", 'fr');
    expect(hit?.kind).toBe(PatternKind.CAPOT);
  });

  test('announcement points win over belote', () => {
    expect(match('recommandation pour 110 points belote rebelote', 'fr')?.kind).toBe(PatternKind.ANNOUNCEMENT_POINTS);
  });

  test('unrelated text matches nothing', () => {
    expect(match('bonjour tout le monde', 'fr')).toBeNull();
  });

  test('families are listed in priority order', () => {
    const kinds = matcher.patternsFor('en').map((p) => p.kind);
    const firstIndex = (k: PatternKind): number => kinds.indexOf(k);
    expect(firstIndex(PatternKind.HAND_EVALUATION)).toBe(0);
    expect(firstIndex(PatternKind.ANNOUNCEMENT_POINTS)).toBeLessThan(firstIndex(PatternKind.BELOTE_REBELOTE));
    expect(firstIndex(PatternKind.BELOTE_REBELOTE)).toBeLessThan(firstIndex(PatternKind.COINCHE));
    expect(firstIndex(PatternKind.COINCHE)).toBeLessThan(firstIndex(PatternKind.CAPOT));
  });
});

describe('PatternMatcher — near-miss phrasings', () => {
  test('pattern text keeps only letters and digits', () => {
    expect(patternText(/analy[sz]e.*(?:game|hand)/)).toBe('analy sz e game hand');
    expect(patternText(/c.est quoi.*coinche/)).toBe('c est quoi coinche');
  });

  test('a misspelled hand request still reaches hand evaluation', () => {
    const hit = matcher.match(makeQuery('evalute hand please', 'en'));
    expect(hit?.kind).toBe(PatternKind.HAND_EVALUATION);
    expect(hit?.intent).toBe(IntentLabel.HAND_EVALUATION);
  });

  test('a clipped belote phrasing returns the belote rule', () => {
    const hit = matcher.match(makeQuery('belot rebelot rules', 'en'));
    expect(hit?.kind).toBe(PatternKind.BELOTE_REBELOTE);
    expect(hit?.response.startsWith('**👑 Official Belote and Rebelote**')).toBe(true);
  });

  test('queries shorter than every pattern text are not scored', () => {
    const scorer = new IndelScorer();
    const partial = jest.spyOn(scorer, 'partialRatio');
    expect(new PatternMatcher(lexicon, composer, scorer).match(makeQuery('hand', 'en'))).toBeNull();
    expect(partial).not.toHaveBeenCalled();
  });

  test('a raised threshold rejects the same phrasing', () => {
    const strict = new PatternMatcher(lexicon, composer, new IndelScorer(), 0.95);
    expect(strict.match(makeQuery('evalute hand please', 'en'))).toBeNull();
  });

  test('a failing scorer yields no hit', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: SimilarityScorer = {
      id: 'indel',
      ratio: () => 0,
      tokenSortRatio: () => 0,
      partialRatio: () => {
        throw new Error('scorer down');
      },
    };
    expect(new PatternMatcher(lexicon, composer, failing).match(makeQuery('evalute hand please', 'en'))).toBeNull();
    expect(error).toHaveBeenCalledTimes(1);
    error.mockRestore();
  });
});

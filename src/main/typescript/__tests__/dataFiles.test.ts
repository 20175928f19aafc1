/**
 * Data loaders — shipped data files and validation errors
 */

import * as fs from 'fs';
import { INTENT_PRIORITY, loadLexicon, parseIntentLabel, parseLexicon } from '../config/lexicon';
import { loadResponseTemplates, parseResponseTemplates } from '../config/responseTemplates';
import { loadRuleCorpus } from '../config/ruleCorpus';
import { AnnouncementResponder, IntentLabel } from '../models/enums';
import { ANNOUNCEMENTS, LANGUAGES } from '../models/types';
import { isRecord } from '../utils/validators';
import { dataFile, makeCorpus, makeRule, makeRuleSide } from './fixtures';

function readJson(name: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(dataFile(name), 'utf-8'));
  if (!isRecord(parsed)) throw new Error(`${name} is not an object`);
  return parsed;
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('data/rules.json', () => {
  const corpus = loadRuleCorpus(dataFile('rules.json'));

  test('has ten bilingual rules with unique ids', () => {
    expect(corpus.size).toBe(10);
    for (const rule of corpus.getAllRules().values()) {
      for (const lang of LANGUAGES) {
        expect(rule.text[lang].title).not.toBe('');
        expect(rule.text[lang].keywords.length).toBeGreaterThan(0);
      }
    }
  });

  test('keeps file order', () => {
    const ids = [...corpus.getAllRules().keys()];
    expect(ids[0]).toBe('announcements_official');
    expect(ids).toContain('belote_rebelote_official');
    expect(ids).toContain('coinche_official');
    expect(ids).toContain('capot_complete_official');
  });
});

describe('parseRuleCorpus validation', () => {
  test('rejects duplicate ids', () => {
    expect(() => makeCorpus([makeRule('a', 'basic'), makeRule('a', 'basic')])).toThrow('rules: duplicate id "a"');
  });

  test('rejects empty keywords', () => {
    const rule = { ...makeRule('a', 'basic'), en: makeRuleSide({ keywords: [] }) };
    expect(() => makeCorpus([rule])).toThrow('rule "a".en: "keywords" must not be empty');
  });

  test('rejects a missing language side', () => {
    expect(() => makeCorpus([{ id: 'a', category: 'basic', fr: makeRuleSide() }])).toThrow('rule "a".en: expected an object');
  });

  test('rejects invalid patterns', () => {
    expect(() => makeCorpus([makeRule('a', 'basic', { patterns: ['(unclosed'] })])).toThrow(
      /rule "a"\.fr: invalid pattern "\(unclosed"/,
    );
  });

  test('rejects an empty rule list', () => {
    expect(() => makeCorpus([])).toThrow('rules: "rules" must be a non-empty array');
  });

  test('lowercases keywords and joins content lines', () => {
    const corpus = makeCorpus([makeRule('a', 'basic', { keywords: ['Belote'], content: ['line one', 'line two'] })]);
    expect(corpus.getRule('a')?.text.fr.keywords).toEqual(['belote']);
    expect(corpus.getRule('a')?.text.fr.content).toBe('line one\nline two');
  });
});

describe('data/lexicon.json', () => {
  const lexicon = loadLexicon(dataFile('lexicon.json'));

  test('intent keywords follow the classification priority', () => {
    for (const lang of LANGUAGES) {
      expect(lexicon.languages[lang].intentKeywords.map((r) => r.intent)).toEqual(INTENT_PRIORITY);
    }
  });

  test('patterns are case-insensitive', () => {
    expect(lexicon.languages.en.intentPatterns.capot[0].test('CAPOT')).toBe(true);
  });

  test('responder cues are compiled for both responders', () => {
    expect(lexicon.responderCues[AnnouncementResponder.CONDITIONS].some((r) => r.test('quand'))).toBe(true);
    expect(lexicon.responderCues[AnnouncementResponder.RECOMMENDATION].some((r) => r.test('advice'))).toBe(true);
  });

  test('parseIntentLabel accepts only known labels', () => {
    expect(parseIntentLabel('capot')).toBe(IntentLabel.CAPOT);
    expect(parseIntentLabel('weather')).toBeNull();
  });

  test('unknown intents and responders are rejected', () => {
    const raw = readJson('lexicon.json');
    expect(() => parseLexicon({ ...raw, intentKeywords: { fr: { weather: ['sun'] }, en: {} } })).toThrow(
      'lexicon.intentKeywords.fr: unknown intent "weather"',
    );
    expect(() => parseLexicon({ ...raw, keywordBoosts: { fr: { belote: -1 }, en: {} } })).toThrow(
      'lexicon.keywordBoosts.fr: boost for "belote" must be a non-negative number',
    );
  });
});

describe('data/responses.json', () => {
  const templates = loadResponseTemplates(dataFile('responses.json'));

  test('every announcement has both texts in both languages', () => {
    for (const lang of LANGUAGES) {
      for (const points of ANNOUNCEMENTS) {
        expect(templates.recommendations[lang].get(points)).toContain(String(points));
        expect(templates.conditions[lang].get(points)).toContain(String(points));
      }
    }
  });

  test('every intent has a fallback', () => {
    for (const lang of LANGUAGES) {
      expect(templates.fallbacks[lang].size).toBe(Object.values(IntentLabel).length);
    }
  });

  test('a missing announcement text is rejected', () => {
    const raw = readJson('responses.json');
    expect(() => parseResponseTemplates({ ...raw, conditions: { fr: {}, en: {} } })).toThrow(
      'responses.conditions.fr: "90" must be a non-empty string',
    );
  });
});

/**
 * INPUT: data/lexicon.json
 * OUTPUT: Lexicon (typo variants, synonyms, keyword boosts, intent keywords, pattern tables)
 * POS: config layer, language data for the normalizer, pattern matcher and intent classifier
 */

import * as fs from 'fs';
import { AnnouncementResponder, IntentLabel } from '../models/enums';
import { AnnouncementPattern, IntentKeywordRule, IntentPatternTable, LanguageLexicon, Lexicon } from '../models/lexicon';
import { Language } from '../models/types';
import {
  compilePattern,
  compilePatterns,
  isStringArray,
  requireRecord,
  requireString,
  requireStringArray,
} from '../utils/validators';

/** Classification priority; general is the default and has no keywords */
export const INTENT_PRIORITY: readonly IntentLabel[] = [
  IntentLabel.BELOTE_REBELOTE,
  IntentLabel.HAND_EVALUATION,
  IntentLabel.CAPOT,
  IntentLabel.ANNOUNCEMENTS,
  IntentLabel.SCORING,
  IntentLabel.CARDS,
  IntentLabel.COINCHE,
  IntentLabel.PARTNER_POINTS,
  IntentLabel.CONTRACT_MANAGEMENT,
  IntentLabel.STRATEGY,
  IntentLabel.BASIC,
  IntentLabel.GENERAL_HELP,
];

export function parseIntentLabel(value: string): IntentLabel | null {
  return Object.values(IntentLabel).find((label) => label === value) ?? null;
}

function parseResponder(value: unknown, where: string): AnnouncementResponder {
  const found = Object.values(AnnouncementResponder).find((r) => r === value);
  if (!found) throw new Error(`${where}: unknown responder "${String(value)}"`);
  return found;
}

function parseListMap(raw: unknown, where: string): Map<string, readonly string[]> {
  const obj = requireRecord(raw, where);
  const map = new Map<string, readonly string[]>();
  for (const key of Object.keys(obj)) {
    map.set(key.toLowerCase(), requireStringArray(obj, key, where).map((v) => v.toLowerCase()));
  }
  return map;
}

function parseBoosts(raw: unknown, where: string): Map<string, number> {
  const obj = requireRecord(raw, where);
  const map = new Map<string, number>();
  for (const [key, value] of Object.entries(obj)) {
    if (typeof value !== 'number' || value < 0) {
      throw new Error(`${where}: boost for "${key}" must be a non-negative number`);
    }
    map.set(key.toLowerCase(), value);
  }
  return map;
}

function parseIntentKeywords(raw: unknown, where: string): IntentKeywordRule[] {
  const obj = requireRecord(raw, where);
  for (const key of Object.keys(obj)) {
    if (!parseIntentLabel(key)) throw new Error(`${where}: unknown intent "${key}"`);
  }
  return INTENT_PRIORITY
    .filter((intent) => obj[intent] !== undefined)
    .map((intent) => ({
      intent,
      patterns: compilePatterns(requireStringArray(obj, intent, where, true), `${where}.${intent}`),
    }));
}

function parseAnnouncementPatterns(raw: unknown, where: string): AnnouncementPattern[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new Error(`${where}: must be a non-empty array`);
  }
  return raw.map((entry, i) => {
    const obj = requireRecord(entry, `${where}[${i}]`);
    return {
      regex: compilePattern(requireString(obj, 'pattern', `${where}[${i}]`), `${where}[${i}]`),
      responder: parseResponder(obj['responder'], `${where}[${i}]`),
    };
  });
}

function parsePatternTable(raw: unknown, where: string): IntentPatternTable {
  const obj = requireRecord(raw, where);
  const list = (key: string): RegExp[] =>
    compilePatterns(requireStringArray(obj, key, where, true), `${where}.${key}`);
  return {
    handEvaluation: list('handEvaluation'),
    announcementPoints: parseAnnouncementPatterns(obj['announcementPoints'], `${where}.announcementPoints`),
    beloteRebelote: list('beloteRebelote'),
    coinche: list('coinche'),
    capot: list('capot'),
  };
}

function parseLanguage(root: Record<string, unknown>, lang: Language): LanguageLexicon {
  const section = (key: string): unknown => requireRecord(root[key], `lexicon.${key}`)[lang];
  return {
    typoVariants: parseListMap(section('typoVariants'), `lexicon.typoVariants.${lang}`),
    synonyms: parseListMap(section('synonyms'), `lexicon.synonyms.${lang}`),
    keywordBoosts: parseBoosts(section('keywordBoosts'), `lexicon.keywordBoosts.${lang}`),
    intentKeywords: parseIntentKeywords(section('intentKeywords'), `lexicon.intentKeywords.${lang}`),
    intentPatterns: parsePatternTable(section('intentPatterns'), `lexicon.intentPatterns.${lang}`),
  };
}

export function parseLexicon(json: unknown): Lexicon {
  const root = requireRecord(json, 'lexicon');
  const cues = requireRecord(root['responderCues'], 'lexicon.responderCues');
  const cueList = (key: AnnouncementResponder): RegExp[] => {
    const value = cues[key];
    if (!isStringArray(value)) throw new Error(`lexicon.responderCues: "${key}" must be an array of strings`);
    return compilePatterns(value, `lexicon.responderCues.${key}`);
  };
  return {
    languages: { fr: parseLanguage(root, 'fr'), en: parseLanguage(root, 'en') },
    responderCues: {
      [AnnouncementResponder.CONDITIONS]: cueList(AnnouncementResponder.CONDITIONS),
      [AnnouncementResponder.RECOMMENDATION]: cueList(AnnouncementResponder.RECOMMENDATION),
    },
  };
}

export function loadLexicon(filePath: string): Lexicon {
  const lexicon = parseLexicon(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  console.log(`[lexicon] loaded ${filePath}`);
  return lexicon;
}

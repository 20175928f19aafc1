/**
 * INPUT: none
 * OUTPUT: compiled lexicon and response template types
 * POS: data model layer, shapes of data/lexicon.json and data/responses.json after loading
 */

import { AnnouncementResponder, IntentLabel } from './enums';
import { Announcement, Language } from './types';

export interface AnnouncementPattern {
  regex: RegExp;
  responder: AnnouncementResponder;
}

export interface IntentKeywordRule {
  intent: IntentLabel;
  patterns: readonly RegExp[];
}

/** Per-language pattern tables for the pattern matcher */
export interface IntentPatternTable {
  handEvaluation: readonly RegExp[];
  announcementPoints: readonly AnnouncementPattern[];
  beloteRebelote: readonly RegExp[];
  coinche: readonly RegExp[];
  capot: readonly RegExp[];
}

export interface LanguageLexicon {
  /** canonical term → known misspellings (canonical included) */
  typoVariants: ReadonlyMap<string, readonly string[]>;
  /** canonical term → synonyms, most relevant first */
  synonyms: ReadonlyMap<string, readonly string[]>;
  keywordBoosts: ReadonlyMap<string, number>;
  /** in classification priority order */
  intentKeywords: readonly IntentKeywordRule[];
  intentPatterns: IntentPatternTable;
}

export interface Lexicon {
  languages: Readonly<Record<Language, LanguageLexicon>>;
  responderCues: Readonly<Record<AnnouncementResponder, readonly RegExp[]>>;
}

export interface HandReportLabels {
  title: string;
  recommendation: string;
  confidence: string;
  analysis: string;
  alternatives: string;
  advice: string;
}

export interface ResponseTemplates {
  recommendations: Readonly<Record<Language, ReadonlyMap<Announcement, string>>>;
  conditions: Readonly<Record<Language, ReadonlyMap<Announcement, string>>>;
  fallbacks: Readonly<Record<Language, ReadonlyMap<IntentLabel, string>>>;
  /** keyed by rule category */
  expertTips: Readonly<Record<Language, ReadonlyMap<string, string>>>;
  handReport: Readonly<Record<Language, HandReportLabels>>;
  seeAlsoHeader: Readonly<Record<Language, string>>;
  apology: Readonly<Record<Language, string>>;
  suggestions: Readonly<Record<Language, readonly string[]>>;
}

/**
 * INPUT: data/responses.json
 * OUTPUT: ResponseTemplates (announcement texts, fallbacks, expert tips, labels, suggestions)
 * POS: config layer, every canned sentence the bot can answer with
 */

import * as fs from 'fs';
import { IntentLabel } from '../models/enums';
import { HandReportLabels, ResponseTemplates } from '../models/lexicon';
import { Announcement, ANNOUNCEMENTS, Language, LANGUAGES } from '../models/types';
import { requireRecord, requireString, requireStringArray, requireText } from '../utils/validators';

type PerLanguage<T> = Record<Language, T>;

function perLanguage<T>(raw: unknown, where: string, parse: (value: unknown, where: string) => T): PerLanguage<T> {
  const obj = requireRecord(raw, where);
  return { fr: parse(obj['fr'], `${where}.fr`), en: parse(obj['en'], `${where}.en`) };
}

function announcementTexts(raw: unknown, where: string): Map<Announcement, string> {
  const obj = requireRecord(raw, where);
  const map = new Map<Announcement, string>();
  for (const points of ANNOUNCEMENTS) {
    map.set(points, requireText(obj, String(points), where));
  }
  return map;
}

function fallbackTexts(raw: unknown, where: string): Map<IntentLabel, string> {
  const obj = requireRecord(raw, where);
  const map = new Map<IntentLabel, string>();
  for (const intent of Object.values(IntentLabel)) {
    map.set(intent, requireText(obj, intent, where));
  }
  return map;
}

function stringMap(raw: unknown, where: string): Map<string, string> {
  const obj = requireRecord(raw, where);
  return new Map(Object.keys(obj).map((key) => [key, requireString(obj, key, where)]));
}

function handReportLabels(raw: unknown, where: string): HandReportLabels {
  const obj = requireRecord(raw, where);
  return {
    title: requireString(obj, 'title', where),
    recommendation: requireString(obj, 'recommendation', where),
    confidence: requireString(obj, 'confidence', where),
    analysis: requireString(obj, 'analysis', where),
    alternatives: requireString(obj, 'alternatives', where),
    advice: requireString(obj, 'advice', where),
  };
}

function plainString(raw: unknown, where: string): string {
  if (typeof raw !== 'string' || !raw.trim()) throw new Error(`${where}: must be a non-empty string`);
  return raw;
}

export function parseResponseTemplates(json: unknown): ResponseTemplates {
  const root = requireRecord(json, 'responses');
  const suggestions = requireRecord(root['suggestions'], 'responses.suggestions');
  return {
    recommendations: perLanguage(root['recommendations'], 'responses.recommendations', announcementTexts),
    conditions: perLanguage(root['conditions'], 'responses.conditions', announcementTexts),
    fallbacks: perLanguage(root['fallbacks'], 'responses.fallbacks', fallbackTexts),
    expertTips: perLanguage(root['expertTips'], 'responses.expertTips', stringMap),
    handReport: perLanguage(root['handReport'], 'responses.handReport', handReportLabels),
    seeAlsoHeader: perLanguage(root['seeAlsoHeader'], 'responses.seeAlsoHeader', plainString),
    apology: perLanguage(root['apology'], 'responses.apology', plainString),
    suggestions: {
      fr: requireStringArray(suggestions, 'fr', 'responses.suggestions', true),
      en: requireStringArray(suggestions, 'en', 'responses.suggestions', true),
    },
  };
}

export function loadResponseTemplates(filePath: string): ResponseTemplates {
  const templates = parseResponseTemplates(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  console.log(`[responseTemplates] loaded ${filePath} (${LANGUAGES.join('/')})`);
  return templates;
}

/**
 * INPUT: data/rules.json
 * OUTPUT: RuleCorpus (frozen, bilingual rule records in file order)
 * POS: config layer, rule content store; loaded once at startup, fails fast on malformed records
 */

import * as fs from 'fs';
import { Language, LANGUAGES, RuleRecord, RuleText } from '../models/types';
import {
  compilePatterns,
  requireRecord,
  requireString,
  requireStringArray,
  requireText,
} from '../utils/validators';

export class RuleCorpus {
  private readonly records: ReadonlyMap<string, RuleRecord>;

  constructor(
    readonly version: string,
    rules: readonly RuleRecord[],
  ) {
    const map = new Map<string, RuleRecord>();
    for (const rule of rules) {
      if (map.has(rule.id)) throw new Error(`rules: duplicate id "${rule.id}"`);
      map.set(rule.id, Object.freeze(rule));
    }
    this.records = map;
  }

  /** All rules in corpus order */
  getAllRules(): ReadonlyMap<string, RuleRecord> {
    return this.records;
  }

  getRule(id: string): RuleRecord | undefined {
    return this.records.get(id);
  }

  get size(): number {
    return this.records.size;
  }

  /** Stable text of every field that feeds embeddings */
  fingerprint(): string {
    const parts: string[] = [this.version];
    for (const rule of this.records.values()) {
      for (const lang of LANGUAGES) {
        const t = rule.text[lang];
        parts.push(rule.id, lang, t.title, t.content, t.keywords.join(','), t.variations.join('|'));
      }
    }
    return parts.join('\u0000');
  }
}

// ─── Parsing ─────────────────────────────────────────────────

function parseRuleText(raw: unknown, where: string): RuleText {
  const obj = requireRecord(raw, where);
  return Object.freeze({
    title: requireString(obj, 'title', where),
    content: requireText(obj, 'content', where),
    keywords: Object.freeze(requireStringArray(obj, 'keywords', where, true).map((k) => k.toLowerCase())),
    patterns: Object.freeze(compilePatterns(requireStringArray(obj, 'patterns', where), where)),
    variations: Object.freeze(requireStringArray(obj, 'variations', where)),
  });
}

function parseRule(raw: unknown, index: number): RuleRecord {
  const obj = requireRecord(raw, `rules[${index}]`);
  const id = requireString(obj, 'id', `rules[${index}]`);
  const where = `rule "${id}"`;
  const category = requireString(obj, 'category', where);
  const text: Record<Language, RuleText> = {
    fr: parseRuleText(obj['fr'], `${where}.fr`),
    en: parseRuleText(obj['en'], `${where}.en`),
  };
  return { id, category, text: Object.freeze(text) };
}

export function parseRuleCorpus(json: unknown): RuleCorpus {
  const root = requireRecord(json, 'rules');
  const version = requireString(root, 'version', 'rules');
  const list = root['rules'];
  if (!Array.isArray(list) || list.length === 0) {
    throw new Error('rules: "rules" must be a non-empty array');
  }
  return new RuleCorpus(version, list.map(parseRule));
}

/** Reads and validates the rule file; throws on any missing or malformed field */
export function loadRuleCorpus(filePath: string): RuleCorpus {
  const raw = fs.readFileSync(filePath, 'utf-8');
  const corpus = parseRuleCorpus(JSON.parse(raw));
  console.log(`[ruleCorpus] loaded ${corpus.size} rules (version ${corpus.version})`);
  return corpus;
}

/**
 * Shared test fixtures: small rule corpora, fake embedding providers, data file paths
 */

import * as path from 'path';
import { parseRuleCorpus, RuleCorpus } from '../config/ruleCorpus';
import { Language, NormalizedQuery } from '../models/types';
import { EmbeddingProvider } from '../services/embeddingProvider';

export const dataFile = (name: string): string => path.resolve(process.cwd(), 'data', name);

export interface RawRuleSide {
  title: string;
  content: string | string[];
  keywords: string[];
  patterns: string[];
  variations: string[];
}

export function makeRuleSide(overrides: Partial<RawRuleSide> = {}): RawRuleSide {
  return {
    title: 'Untitled',
    content: 'Body',
    keywords: ['placeholder'],
    patterns: [],
    variations: [],
    ...overrides,
  };
}

export function makeRule(
  id: string,
  category: string,
  side: Partial<RawRuleSide> = {},
): { id: string; category: string; fr: RawRuleSide; en: RawRuleSide } {
  return { id, category, fr: makeRuleSide(side), en: makeRuleSide(side) };
}

export function makeCorpus(rules: unknown[], version = 'test-1'): RuleCorpus {
  return parseRuleCorpus({ version, rules });
}

export function makeQuery(
  text: string,
  language: Language = 'en',
  normalized = text.toLowerCase(),
): NormalizedQuery {
  return {
    original: text,
    language,
    normalized,
    keywords: new Set(normalized.split(/\s+/).filter(Boolean)),
  };
}

/** Every text maps to the same unit vector */
export function makeConstantProvider(dimensions = 2, id = 'constant-test'): EmbeddingProvider & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    id,
    dimensions,
    calls,
    async embed(texts: string[]): Promise<number[][]> {
      calls.push(texts);
      return texts.map(() => Array.from({ length: dimensions }, (_, i) => (i === 0 ? 1 : 0)));
    },
  };
}

export function makeFailingProvider(message = 'provider down'): EmbeddingProvider {
  return {
    id: 'failing-test',
    dimensions: 2,
    embed: () => Promise.reject(new Error(message)),
  };
}

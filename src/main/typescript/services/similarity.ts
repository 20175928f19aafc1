/**
 * INPUT: two strings
 * OUTPUT: similarity scores on a 0..1 scale
 * POS: service layer, string-similarity capability used by the normalizer, fuzzy matcher and retriever
 *
 * Two interchangeable backends: the fuzzball library, and a plain InDel-distance
 * implementation with the same ratio definition. The backend is picked once at startup.
 */

import * as fuzz from 'fuzzball';
import { SimilarityBackend } from '../config/appConfig';

export interface SimilarityScorer {
  readonly id: SimilarityBackend;
  /** whole-string similarity */
  ratio(a: string, b: string): number;
  /** similarity after sorting the words of both strings */
  tokenSortRatio(a: string, b: string): number;
  /** best similarity of the shorter string against any same-length window of the longer */
  partialRatio(a: string, b: string): number;
}

// ─── fuzzball ─────────────────────────────────────────────────

export class FuzzballScorer implements SimilarityScorer {
  readonly id = 'fuzzball' as const;

  ratio(a: string, b: string): number {
    return fuzz.ratio(a, b) / 100;
  }

  tokenSortRatio(a: string, b: string): number {
    return fuzz.token_sort_ratio(a, b) / 100;
  }

  partialRatio(a: string, b: string): number {
    return fuzz.partial_ratio(a, b) / 100;
  }
}

// ─── InDel distance ───────────────────────────────────────────

/** Lowercase, non-alphanumerics to spaces, collapsed */
export function processText(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

function longestCommonSubsequence(a: string, b: string): number {
  const prev = new Array<number>(b.length + 1).fill(0);
  const curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    for (let j = 0; j <= b.length; j++) prev[j] = curr[j];
  }
  return prev[b.length];
}

/** (|a| + |b| - indel) / (|a| + |b|), where indel = |a| + |b| - 2·LCS */
export function indelRatio(a: string, b: string): number {
  if (!a || !b) return 0;
  return (2 * longestCommonSubsequence(a, b)) / (a.length + b.length);
}

export class IndelScorer implements SimilarityScorer {
  readonly id = 'indel' as const;

  ratio(a: string, b: string): number {
    return indelRatio(processText(a), processText(b));
  }

  tokenSortRatio(a: string, b: string): number {
    const sorted = (s: string): string => processText(s).split(' ').sort().join(' ');
    return indelRatio(sorted(a), sorted(b));
  }

  partialRatio(a: string, b: string): number {
    const x = processText(a);
    const y = processText(b);
    const [shorter, longer] = x.length <= y.length ? [x, y] : [y, x];
    if (!shorter) return 0;
    let best = 0;
    for (let i = 0; i + shorter.length <= longer.length; i++) {
      best = Math.max(best, indelRatio(shorter, longer.slice(i, i + shorter.length)));
      if (best === 1) break;
    }
    return best;
  }
}

export function createSimilarityScorer(backend: SimilarityBackend): SimilarityScorer {
  return backend === 'fuzzball' ? new FuzzballScorer() : new IndelScorer();
}

/**
 * INPUT: free-text hand description + language
 * OUTPUT: HandEvaluation (recommended announcement, confidence, reasoning, alternatives, breakdown)
 * POS: service layer, keyword-presence heuristic over trump and suit tokens; pure
 */

import { Announcement, HandBreakdown, HandEvaluation, Language } from '../models/types';

// ─── Token sets ───────────────────────────────────────────────

const JACK = new Set(['valet', 'valets', 'v', 'j', 'jack', 'jacks']);
const NINE = new Set(['9', 'neuf', 'nine']);
const ACE = new Set(['as', 'ace', 'aces']);
const TEN = new Set(['10', 'dix', 'ten']);
const OTHER_RANKS = new Set([
  'roi', 'rois', 'king', 'kings', 'r', 'k',
  'dame', 'dames', 'queen', 'queens', 'd', 'q',
  '8', 'huit', 'eight', '7', 'sept', 'seven',
]);

const SUITS: ReadonlyArray<readonly [string, ReadonlySet<string>]> = [
  ['spades', new Set(['pique', 'piques', 'spade', 'spades', '♠'])],
  ['hearts', new Set(['coeur', 'coeurs', 'cœur', 'cœurs', 'heart', 'hearts', '♥'])],
  ['diamonds', new Set(['carreau', 'carreaux', 'diamond', 'diamonds', '♦'])],
  ['clubs', new Set(['trèfle', 'trèfles', 'trefle', 'trefles', 'club', 'clubs', '♣'])],
];

/** "4 autres atouts", "2 other trumps": trumps not named by rank */
const OTHER_TRUMPS = /(\d+)\s+(?:autres?\s+atouts?|other\s+trumps?|more\s+trumps?)/;
/** "6 atouts", "6 trumps": total trump count */
const TOTAL_TRUMPS = /(\d+)\s+(?:cartes?\s+d.atout|atouts?|trumps?|trump\s+cards?)/;

const REASONING: Record<Language, Record<Announcement, string>> = {
  fr: {
    140: 'Atouts complets avec au moins 6 atouts : domination quasi totale.',
    130: 'Atouts complets et seulement 2 couleurs en main.',
    120: 'Atouts complets et seulement 3 couleurs en main.',
    110: 'Atouts complets (Valet, 9, As, 10 ou 2+ autres atouts).',
    100: 'Plusieurs atouts sans atouts complets : annonce flexible.',
    90: 'Main limitée : annonce minimale, vérifiez d\'avoir 2 As.',
  },
  en: {
    140: 'Complete trumps with at least 6 trumps: near-total control.',
    130: 'Complete trumps and only 2 colors in hand.',
    120: 'Complete trumps and only 3 colors in hand.',
    110: 'Complete trumps (Jack, 9, Ace, 10 or 2+ other trumps).',
    100: 'Several trumps without complete trumps: flexible announcement.',
    90: 'Limited hand: minimum announcement, make sure you hold 2 Aces.',
  },
};

// ─── Scanning ─────────────────────────────────────────────────

export function tokenizeHand(description: string): string[] {
  return description
    .toLowerCase()
    .replace(/\b[a-z]['’]/g, ' ')
    .split(/[^\p{L}\p{N}♠♥♦♣]+/u)
    .filter((t) => t.length > 0);
}

export function analyzeHand(description: string): HandBreakdown {
  const lower = description.toLowerCase();
  const tokens = tokenizeHand(description);

  const hasJack = tokens.some((t) => JACK.has(t));
  const hasNine = tokens.some((t) => NINE.has(t));
  const hasAce = tokens.some((t) => ACE.has(t));
  const hasTen = tokens.some((t) => TEN.has(t));
  const rankTokens = tokens.filter(
    (t) => JACK.has(t) || NINE.has(t) || ACE.has(t) || TEN.has(t) || OTHER_RANKS.has(t),
  ).length;

  const otherMatch = OTHER_TRUMPS.exec(lower);
  const otherTrumps = otherMatch ? parseInt(otherMatch[1], 10) : 0;
  const totalMatch = otherMatch ? null : TOTAL_TRUMPS.exec(lower);
  const statedTotal = totalMatch ? parseInt(totalMatch[1], 10) : 0;
  const trumpCount = Math.max(rankTokens + otherTrumps, statedTotal);

  const completeTrumps = hasJack && hasNine && hasAce && (hasTen || otherTrumps >= 2);

  const suitsMentioned = SUITS.filter(([, names]) => tokens.some((t) => names.has(t))).length;
  // the first suit named is taken as trump
  const nonTrumpSuits = Math.max(0, suitsMentioned - 1);

  return { hasJack, hasNine, hasAce, hasTen, completeTrumps, trumpCount, suitsMentioned, nonTrumpSuits };
}

// ─── Decision table ──────────────────────────────────────────

function decide(b: HandBreakdown): { points: Announcement; confidence: number; alternatives: Announcement[] } {
  if (b.completeTrumps && b.trumpCount >= 6) return { points: 140, confidence: 0.85, alternatives: [130] };
  if (b.completeTrumps && b.nonTrumpSuits >= 1 && b.suitsMentioned <= 2) {
    return { points: 130, confidence: 0.9, alternatives: [120, 140] };
  }
  if (b.completeTrumps && b.nonTrumpSuits >= 1 && b.suitsMentioned <= 3) {
    return { points: 120, confidence: 0.85, alternatives: [110, 130] };
  }
  if (b.completeTrumps) return { points: 110, confidence: 0.9, alternatives: [100, 120] };
  if (b.trumpCount >= 3) return { points: 100, confidence: 0.7, alternatives: [90, 110] };
  return { points: 90, confidence: 0.6, alternatives: [100] };
}

export function evaluateHand(description: string, language: Language): HandEvaluation {
  const breakdown = analyzeHand(description);
  const { points, confidence, alternatives } = decide(breakdown);
  return {
    recommendedAnnouncement: points,
    confidence,
    reasoning: REASONING[language][points],
    alternatives,
    breakdown,
  };
}

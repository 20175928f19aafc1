/**
 * INPUT: none
 * OUTPUT: rule, query, match, hand evaluation, session and LINE message types
 * POS: data model layer, interfaces shared by services, core and api
 */

import { IntentLabel, MatchType, TurnSender } from './enums';

/** Supported languages */
export type Language = 'fr' | 'en';

export const LANGUAGES: readonly Language[] = ['fr', 'en'];

export function isLanguage(value: unknown): value is Language {
  return value === 'fr' || value === 'en';
}

// ─── Rule corpus ─────────────────────────────────────────────

/** One language side of a rule record */
export interface RuleText {
  title: string;
  content: string;
  keywords: readonly string[];
  patterns: readonly RegExp[];
  variations: readonly string[];
}

/** Bilingual rule record, immutable after load */
export interface RuleRecord {
  id: string;
  category: string;
  text: Readonly<Record<Language, RuleText>>;
}

// ─── Query pipeline ──────────────────────────────────────────

export interface NormalizedQuery {
  original: string;
  language: Language;
  /** lowercased, typo-corrected, synonym-expanded text */
  normalized: string;
  keywords: ReadonlySet<string>;
}

/** Score is cosine similarity plus additive boosts, not a probability */
export interface Match {
  ruleId: string;
  score: number;
  type: MatchType;
}

/** Announcement values a hand can be evaluated to */
export type Announcement = 90 | 100 | 110 | 120 | 130 | 140;

export const ANNOUNCEMENTS: readonly Announcement[] = [90, 100, 110, 120, 130, 140];

export function toAnnouncement(value: number): Announcement | null {
  return ANNOUNCEMENTS.find((a) => a === value) ?? null;
}

export interface HandBreakdown {
  hasJack: boolean;
  hasNine: boolean;
  hasAce: boolean;
  hasTen: boolean;
  completeTrumps: boolean;
  trumpCount: number;
  suitsMentioned: number;
  nonTrumpSuits: number;
}

export interface HandEvaluation {
  recommendedAnnouncement: Announcement;
  /** 0..1 */
  confidence: number;
  reasoning: string;
  alternatives: Announcement[];
  breakdown?: HandBreakdown;
}

/** Result of routing one query */
export interface QueryOutcome {
  answer: string;
  intent: IntentLabel;
  /** stage that produced the answer; null for fallbacks */
  matchType: MatchType | null;
  cached: boolean;
}

// ─── Conversation ───────────────────────────────────────────

export interface ConversationTurn {
  sender: TurnSender;
  content: string;
  timestamp: number;
}

/** Per-user state kept between messages */
export interface UserSession {
  userId: string;
  language: Language;
  turns: ConversationTurn[];
  createdAt: number;
  updatedAt: number;
}

// ─── LINE ─────────────────────────────────────────────────────

/** LINE reply message */
export interface LineReplyMessage {
  type: 'text';
  text: string;
  quickReply?: {
    items: QuickReplyItem[];
  };
}

/** Quick Reply item */
export interface QuickReplyItem {
  type: 'action';
  action: {
    type: 'message';
    label: string;
    text: string;
  };
}

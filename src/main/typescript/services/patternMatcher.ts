/**
 * INPUT: NormalizedQuery
 * OUTPUT: PatternHit (canned response) or null when no pattern applies
 * POS: service layer, fast path of the query pipeline; an ordered list of tagged
 *      patterns evaluated top to bottom, first valid match wins
 *
 * Priority: hand evaluation → announcement points → belote/rebelote → coinche → capot.
 * An announcement capture outside {90..140} is skipped, never an error.
 * When no regex matches, near-miss phrasings of the hand and belote patterns are
 * caught by partial similarity against the pattern text (score ≥ 0.75).
 */

import { AnnouncementResponder, IntentLabel, PatternKind } from '../models/enums';
import { IntentPatternTable, Lexicon } from '../models/lexicon';
import { Announcement, Language, NormalizedQuery, toAnnouncement } from '../models/types';
import { evaluateHand } from './handEvaluator';
import { ResponseComposer } from './responseComposer';
import { SimilarityScorer } from './similarity';

/** Minimum partial similarity for a near-miss pattern hit */
export const NEAR_MISS_THRESHOLD = 0.75;

export type PatternIntent =
  | { kind: PatternKind.HAND_EVALUATION; regex: RegExp }
  | { kind: PatternKind.ANNOUNCEMENT_POINTS; regex: RegExp; responder: AnnouncementResponder }
  | { kind: PatternKind.BELOTE_REBELOTE; regex: RegExp }
  | { kind: PatternKind.COINCHE; regex: RegExp }
  | { kind: PatternKind.CAPOT; regex: RegExp };

export interface PatternHit {
  kind: PatternKind;
  intent: IntentLabel;
  response: string;
  points?: Announcement;
  responder?: AnnouncementResponder;
}

/** Rule records answering the topic patterns */
const TOPIC_RULES: Record<PatternKind.BELOTE_REBELOTE | PatternKind.COINCHE | PatternKind.CAPOT, { ruleId: string; intent: IntentLabel }> = {
  [PatternKind.BELOTE_REBELOTE]: { ruleId: 'belote_rebelote_official', intent: IntentLabel.BELOTE_REBELOTE },
  [PatternKind.COINCHE]: { ruleId: 'coinche_official', intent: IntentLabel.COINCHE },
  [PatternKind.CAPOT]: { ruleId: 'capot_complete_official', intent: IntentLabel.CAPOT },
};

type NearMissIntent = Extract<PatternIntent, { kind: PatternKind.HAND_EVALUATION | PatternKind.BELOTE_REBELOTE }>;

interface NearMissTarget {
  intent: NearMissIntent;
  /** pattern source with regex syntax reduced to spaces */
  text: string;
}

export function patternText(regex: RegExp): string {
  return regex.source.replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

function isNearMissIntent(intent: PatternIntent): intent is NearMissIntent {
  return intent.kind === PatternKind.HAND_EVALUATION || intent.kind === PatternKind.BELOTE_REBELOTE;
}

export function buildPatternIntents(table: IntentPatternTable): PatternIntent[] {
  return [
    ...table.handEvaluation.map((regex) => ({ kind: PatternKind.HAND_EVALUATION, regex }) as const),
    ...table.announcementPoints.map(
      ({ regex, responder }) => ({ kind: PatternKind.ANNOUNCEMENT_POINTS, regex, responder }) as const,
    ),
    ...table.beloteRebelote.map((regex) => ({ kind: PatternKind.BELOTE_REBELOTE, regex }) as const),
    ...table.coinche.map((regex) => ({ kind: PatternKind.COINCHE, regex }) as const),
    ...table.capot.map((regex) => ({ kind: PatternKind.CAPOT, regex }) as const),
  ];
}

export class PatternMatcher {
  private readonly intents: Readonly<Record<Language, readonly PatternIntent[]>>;
  private readonly nearMissTargets: Readonly<Record<Language, readonly NearMissTarget[]>>;

  constructor(
    private readonly lexicon: Lexicon,
    private readonly composer: ResponseComposer,
    private readonly scorer: SimilarityScorer,
    private readonly nearMissThreshold = NEAR_MISS_THRESHOLD,
  ) {
    this.intents = {
      fr: buildPatternIntents(lexicon.languages.fr.intentPatterns),
      en: buildPatternIntents(lexicon.languages.en.intentPatterns),
    };
    const targets = (intents: readonly PatternIntent[]): NearMissTarget[] =>
      intents.filter(isNearMissIntent).map((intent) => ({ intent, text: patternText(intent.regex) }));
    this.nearMissTargets = { fr: targets(this.intents.fr), en: targets(this.intents.en) };
  }

  patternsFor(language: Language): readonly PatternIntent[] {
    return this.intents[language];
  }

  match(query: NormalizedQuery): PatternHit | null {
    const raw = query.original.toLowerCase();
    const subjects = raw === query.normalized ? [raw] : [raw, query.normalized];

    for (const intent of this.intents[query.language]) {
      for (const subject of subjects) {
        const m = intent.regex.exec(subject);
        const hit = m ? this.respond(intent, m[1], raw, query) : null;
        if (hit) return hit;
      }
    }
    return this.matchNearMiss(raw, query);
  }

  /** Best partial similarity of a pattern text inside the raw query; first target wins ties */
  private matchNearMiss(raw: string, query: NormalizedQuery): PatternHit | null {
    let best: { target: NearMissTarget; score: number } | null = null;
    for (const target of this.nearMissTargets[query.language]) {
      // the pattern text must fit inside the query
      if (target.text.length > raw.length) continue;
      let score: number;
      try {
        score = this.scorer.partialRatio(raw, target.text);
      } catch (err) {
        console.error(`[patternMatcher] ${this.scorer.id} failed:`, err);
        return null;
      }
      if (!best || score > best.score) best = { target, score };
    }
    if (!best || best.score < this.nearMissThreshold) return null;
    return this.respond(best.target.intent, undefined, raw, query);
  }

  private respond(intent: PatternIntent, capture: string | undefined, raw: string, query: NormalizedQuery): PatternHit | null {
    const { language } = query;

    switch (intent.kind) {
      case PatternKind.HAND_EVALUATION: {
        const evaluation = evaluateHand(query.original, language);
        return {
          kind: intent.kind,
          intent: IntentLabel.HAND_EVALUATION,
          response: this.composer.handReport(evaluation, language),
          points: evaluation.recommendedAnnouncement,
        };
      }
      case PatternKind.ANNOUNCEMENT_POINTS: {
        const points = capture === undefined ? null : toAnnouncement(parseInt(capture, 10));
        if (points === null) return null;
        const responder = this.resolveResponder(raw, intent.responder);
        return {
          kind: intent.kind,
          intent: IntentLabel.ANNOUNCEMENTS,
          response:
            responder === AnnouncementResponder.CONDITIONS
              ? this.composer.conditions(points, language)
              : this.composer.recommendation(points, language),
          points,
          responder,
        };
      }
      case PatternKind.BELOTE_REBELOTE:
      case PatternKind.COINCHE:
      case PatternKind.CAPOT: {
        const topic = TOPIC_RULES[intent.kind];
        const response = this.composer.renderRule(topic.ruleId, language);
        return response ? { kind: intent.kind, intent: topic.intent, response } : null;
      }
    }
  }

  /** "when/quand" → conditions, else a recommendation cue → recommendation, else the pattern's own */
  private resolveResponder(raw: string, fallback: AnnouncementResponder): AnnouncementResponder {
    const cues = this.lexicon.responderCues;
    if (cues[AnnouncementResponder.CONDITIONS].some((c) => c.test(raw))) return AnnouncementResponder.CONDITIONS;
    if (cues[AnnouncementResponder.RECOMMENDATION].some((c) => c.test(raw))) return AnnouncementResponder.RECOMMENDATION;
    return fallback;
  }
}

/**
 * INPUT: ranked matches / pattern hits / hand evaluations + language
 * OUTPUT: user-facing answer text
 * POS: service layer, renders rules, expert tips, "see also" lists, canned announcement texts and fallbacks
 */

import { RuleCorpus } from '../config/ruleCorpus';
import { Thresholds } from '../config/appConfig';
import { IntentLabel } from '../models/enums';
import { ResponseTemplates } from '../models/lexicon';
import { Announcement, HandEvaluation, Language, Match } from '../models/types';

function fill(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    values[key] !== undefined ? String(values[key]) : whole,
  );
}

export class ResponseComposer {
  constructor(
    private readonly corpus: RuleCorpus,
    private readonly templates: ResponseTemplates,
    private readonly thresholds: Pick<Thresholds, 'semantic' | 'expertTip' | 'seeAlso'>,
  ) {}

  /** "**title**\n\ncontent" of one rule */
  renderRule(ruleId: string, language: Language): string | null {
    const rule = this.corpus.getRule(ruleId);
    if (!rule) return null;
    const t = rule.text[language];
    return `**${t.title}**\n\n${t.content}`;
  }

  /** null when the top match does not clear the semantic threshold */
  composeRanked(matches: readonly Match[], language: Language): string | null {
    const [top, ...rest] = matches;
    if (!top || top.score <= this.thresholds.semantic) return null;
    const rule = this.corpus.getRule(top.ruleId);
    const body = this.renderRule(top.ruleId, language);
    if (!rule || !body) return null;

    const sections = [body];
    const tip = this.templates.expertTips[language].get(rule.category);
    if (tip && top.score > this.thresholds.expertTip) sections.push(tip);

    if (top.score > this.thresholds.seeAlso && rest.length > 0) {
      const titles = rest
        .slice(0, 2)
        .map((m) => this.corpus.getRule(m.ruleId)?.text[language].title)
        .filter((title): title is string => title !== undefined);
      if (titles.length > 0) {
        sections.push([this.templates.seeAlsoHeader[language], ...titles.map((t) => `• ${t}`)].join('\n'));
      }
    }
    return sections.join('\n\n');
  }

  recommendation(points: Announcement, language: Language): string {
    return this.templates.recommendations[language].get(points) ?? this.fallback(IntentLabel.ANNOUNCEMENTS, language);
  }

  conditions(points: Announcement, language: Language): string {
    return this.templates.conditions[language].get(points) ?? this.fallback(IntentLabel.ANNOUNCEMENTS, language);
  }

  handReport(evaluation: HandEvaluation, language: Language): string {
    const labels = this.templates.handReport[language];
    const lines = [
      labels.title,
      '',
      fill(labels.recommendation, { points: evaluation.recommendedAnnouncement }),
      fill(labels.confidence, { confidence: Math.round(evaluation.confidence * 100) }),
      '',
      labels.analysis,
      evaluation.reasoning,
    ];
    if (evaluation.alternatives.length > 0) {
      lines.push('', fill(labels.alternatives, { alternatives: evaluation.alternatives.join(', ') }));
    }
    lines.push('', labels.advice);
    return lines.join('\n');
  }

  fallback(intent: IntentLabel, language: Language): string {
    const byIntent = this.templates.fallbacks[language];
    return byIntent.get(intent) ?? byIntent.get(IntentLabel.GENERAL) ?? this.templates.apology[language];
  }

  apology(language: Language): string {
    return this.templates.apology[language];
  }

  suggestions(language: Language): readonly string[] {
    return this.templates.suggestions[language];
  }
}

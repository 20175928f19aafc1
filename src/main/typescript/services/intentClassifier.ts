/**
 * INPUT: text + language lexicon
 * OUTPUT: IntentLabel (first label in priority order whose keyword patterns match)
 * POS: service layer, picks the fallback template when no stage answers confidently
 */

import { IntentLabel } from '../models/enums';
import { LanguageLexicon } from '../models/lexicon';

export function classifyIntent(text: string, lexicon: LanguageLexicon): IntentLabel {
  const lower = text.toLowerCase();
  for (const rule of lexicon.intentKeywords) {
    if (rule.patterns.some((p) => p.test(lower))) return rule.intent;
  }
  return IntentLabel.GENERAL;
}

/** Query intent, or the newest non-general context intent when the query itself is general */
export function classifyWithContext(
  text: string,
  context: readonly string[],
  lexicon: LanguageLexicon,
): { intent: IntentLabel; fromContext: boolean } {
  const own = classifyIntent(text, lexicon);
  if (own !== IntentLabel.GENERAL) return { intent: own, fromContext: false };

  for (let i = context.length - 1; i >= 0; i--) {
    const intent = classifyIntent(context[i], lexicon);
    if (intent !== IntentLabel.GENERAL) return { intent, fromContext: true };
  }
  return { intent: IntentLabel.GENERAL, fromContext: false };
}

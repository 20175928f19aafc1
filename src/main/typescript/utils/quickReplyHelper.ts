/**
 * INPUT: suggested questions, reply text
 * OUTPUT: LINE Quick Reply objects and LINE-safe text
 * POS: utility module for the LINE conversation handler
 */

import { LineReplyMessage, QuickReplyItem } from '../models/types';

/** LINE limits */
export const MAX_TEXT_LENGTH = 5000;
const MAX_LABEL_LENGTH = 20;
const MAX_QUICK_REPLY_ITEMS = 13;

function item(label: string, text?: string): QuickReplyItem {
  const chars = Array.from(label);
  const shortLabel = chars.length > MAX_LABEL_LENGTH ? `${chars.slice(0, MAX_LABEL_LENGTH - 1).join('')}…` : label;
  return {
    type: 'action',
    action: { type: 'message', label: shortLabel, text: text ?? label },
  };
}

/** Suggested follow-up questions */
export function suggestionQuickReply(suggestions: readonly string[]): { items: QuickReplyItem[] } {
  return { items: suggestions.slice(0, MAX_QUICK_REPLY_ITEMS).map((s) => item(s)) };
}

/** LINE renders no markdown: drop bold markers and cap the length */
export function toLineText(text: string): string {
  const plain = text.replace(/\*\*/g, '');
  const chars = Array.from(plain);
  return chars.length > MAX_TEXT_LENGTH ? `${chars.slice(0, MAX_TEXT_LENGTH - 1).join('')}…` : plain;
}

export function textMessage(text: string, suggestions?: readonly string[]): LineReplyMessage {
  const message: LineReplyMessage = { type: 'text', text: toLineText(text) };
  if (suggestions && suggestions.length > 0) message.quickReply = suggestionQuickReply(suggestions);
  return message;
}

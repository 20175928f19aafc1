/**
 * INPUT: UserSession
 * OUTPUT: bounded turn history, recent user context, localized summary
 * POS: core module, conversation transcript kept inside each session
 */

import { TurnSender } from '../models/enums';
import { ConversationTurn, Language, UserSession } from '../models/types';

/** Turns kept per session */
export const MAX_TURNS = 10;
/** Turns scanned for context */
export const CONTEXT_TURNS = 5;

export function appendTurn(session: UserSession, sender: TurnSender, content: string, timestamp = Date.now()): ConversationTurn {
  const turn: ConversationTurn = { sender, content, timestamp };
  session.turns.push(turn);
  if (session.turns.length > MAX_TURNS) {
    session.turns.splice(0, session.turns.length - MAX_TURNS);
  }
  return turn;
}

/** User-authored contents among the last CONTEXT_TURNS turns, oldest first */
export function getRecentContext(session: UserSession): string[] {
  return session.turns
    .slice(-CONTEXT_TURNS)
    .filter((t) => t.sender === TurnSender.USER)
    .map((t) => t.content);
}

export function summarizeConversation(turns: readonly ConversationTurn[], language: Language): string {
  if (turns.length === 0) return language === 'fr' ? 'Aucune conversation' : 'No conversation';
  const questions = turns.filter((t) => t.sender === TurnSender.USER).length;
  const answers = turns.length - questions;
  return language === 'fr'
    ? `Conversation: ${questions} questions, ${answers} réponses`
    : `Conversation: ${questions} questions, ${answers} responses`;
}

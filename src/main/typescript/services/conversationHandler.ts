/**
 * INPUT: LINE text message events
 * OUTPUT: replies through the LINE Messaging API
 * POS: service layer, LINE conversation flow: commands (language, clear, summary) and rule questions
 */

import { WebhookEvent, messagingApi } from '@line/bot-sdk';
import { getLineClient } from '../core/lineClient';
import { appendTurn, getRecentContext, summarizeConversation } from '../core/conversationLog';
import { getSession, isCurrentSession, resetSession, updateSession } from '../core/sessionStore';
import { TurnSender } from '../models/enums';
import { Language, LineReplyMessage, UserSession } from '../models/types';
import { textMessage } from '../utils/quickReplyHelper';
import { getSuggestions, processQuery } from './queryService';

const LANGUAGE_COMMANDS = new Set(['langue', 'language']);
const CLEAR_COMMANDS = new Set(['effacer', 'clear']);
const SUMMARY_COMMANDS = new Set(['résumé', 'resume', 'summary']);

const MESSAGES: Record<Language, { languageSwitched: string; cleared: string; failed: string }> = {
  fr: {
    languageSwitched: 'Langue changée : français 🇫🇷',
    cleared: 'Conversation effacée ✅',
    failed: '⚠️ Le service est momentanément indisponible, réessayez plus tard.',
  },
  en: {
    languageSwitched: 'Language switched: English 🇬🇧',
    cleared: 'Conversation cleared ✅',
    failed: '⚠️ The service is temporarily unavailable, please try again later.',
  },
};

/** Handles one webhook event */
export async function handleEvent(event: WebhookEvent): Promise<void> {
  if (event.type !== 'message' || event.message.type !== 'text') return;

  const userId = event.source?.userId;
  const replyToken = event.replyToken;
  if (!userId || !replyToken) return;

  const session = getSession(userId);
  const userText = event.message.text.trim();
  const command = userText.toLowerCase();

  if (LANGUAGE_COMMANDS.has(command)) {
    session.language = session.language === 'fr' ? 'en' : 'fr';
    updateSession(session);
    return replyMessages(replyToken, [
      textMessage(MESSAGES[session.language].languageSwitched, await getSuggestions(session.language)),
    ]);
  }

  if (CLEAR_COMMANDS.has(command)) {
    const fresh = resetSession(userId);
    return replyMessages(replyToken, [textMessage(MESSAGES[fresh.language].cleared)]);
  }

  if (SUMMARY_COMMANDS.has(command)) {
    return replyMessages(replyToken, [textMessage(summarizeConversation(session.turns, session.language))]);
  }

  if (!userText) return;
  return answerQuestion(replyToken, session, userText);
}

async function answerQuestion(replyToken: string, session: UserSession, question: string): Promise<void> {
  const { language } = session;
  let reply: LineReplyMessage;
  try {
    const outcome = await processQuery(question, language, getRecentContext(session));
    if (isCurrentSession(session)) {
      appendTurn(session, TurnSender.USER, question);
      appendTurn(session, TurnSender.SYSTEM, outcome.answer);
      updateSession(session);
    }
    reply = textMessage(outcome.answer, await getSuggestions(language));
  } catch (err) {
    console.error('[conversationHandler] query failed:', err);
    reply = textMessage(MESSAGES[language].failed);
  }
  return replyMessages(replyToken, [reply]);
}

// ─── LINE API ────────────────────────────────────────────────

async function replyMessages(replyToken: string, messages: LineReplyMessage[]): Promise<void> {
  const valid = messages.filter((m) => m.text.length > 0);
  if (valid.length === 0) return;
  await getLineClient().replyMessage({ replyToken, messages: toLineMessages(valid) });
}

/** LineReplyMessage → LINE SDK text messages */
function toLineMessages(messages: LineReplyMessage[]): messagingApi.TextMessage[] {
  return messages.map((msg) => {
    const m: messagingApi.TextMessage = { type: 'text', text: msg.text };
    if (msg.quickReply) m.quickReply = { items: msg.quickReply.items };
    return m;
  });
}

/**
 * INPUT: POST /api/query (QueryRequest JSON)
 * OUTPUT: { success: true, answer, language, cached }
 * POS: API layer, request validation + session bookkeeping around queryService.processQuery
 */

import { Router, Request, Response } from 'express';
import { appendTurn, getRecentContext } from '../core/conversationLog';
import { getSession, isCurrentSession, updateSession } from '../core/sessionStore';
import { TurnSender } from '../models/enums';
import { ApiErrorResponse, QueryRequest, QueryResponse } from '../models/query';
import { isLanguage } from '../models/types';
import { processQuery } from '../services/queryService';
import { isRecord, isStringArray } from '../utils/validators';

export const queryRouter = Router();

const MAX_QUESTION_LENGTH = 500;
const MAX_CONTEXT_ENTRIES = 10;

// ─── Validation ───────────────────────────────────────────────

export function validateRequest(body: unknown): { valid: true; req: QueryRequest } | { valid: false; error: string } {
  if (!isRecord(body)) {
    return { valid: false, error: 'request body must be a JSON object' };
  }

  // question: required, 1..500 chars
  const question = body['question'];
  if (typeof question !== 'string' || !question.trim()) {
    return { valid: false, error: 'question is required' };
  }
  if (question.length > MAX_QUESTION_LENGTH) {
    return { valid: false, error: `question must not exceed ${MAX_QUESTION_LENGTH} characters` };
  }

  const language = body['language'];
  if (language !== undefined && !isLanguage(language)) {
    return { valid: false, error: 'language must be "fr" or "en"' };
  }

  const userId = body['userId'];
  if (userId !== undefined && (typeof userId !== 'string' || !userId.trim())) {
    return { valid: false, error: 'userId must be a non-empty string' };
  }

  const context = body['context'];
  if (context !== undefined && (!isStringArray(context) || context.length > MAX_CONTEXT_ENTRIES)) {
    return { valid: false, error: `context must be an array of at most ${MAX_CONTEXT_ENTRIES} strings` };
  }

  return {
    valid: true,
    req: {
      question: question.trim(),
      language,
      userId: userId?.trim(),
      context,
    },
  };
}

// ─── POST /api/query ──────────────────────────────────────────

queryRouter.post('/query', async (req: Request, res: Response): Promise<void> => {
  const validation = validateRequest(req.body);
  if (!validation.valid) {
    const errResp: ApiErrorResponse = { success: false, message: validation.error };
    res.status(400).json(errResp);
    return;
  }

  const { question, userId } = validation.req;
  const session = userId ? getSession(userId) : null;
  const language = validation.req.language ?? session?.language ?? 'fr';
  const context = validation.req.context ?? (session ? getRecentContext(session) : []);

  try {
    const outcome = await processQuery(question, language, context);
    // a DELETE may have landed while the pipeline ran
    if (session && isCurrentSession(session)) {
      session.language = language;
      appendTurn(session, TurnSender.USER, question);
      appendTurn(session, TurnSender.SYSTEM, outcome.answer);
      updateSession(session);
    }
    const response: QueryResponse = { success: true, answer: outcome.answer, language, cached: outcome.cached };
    res.json(response);
  } catch (err) {
    console.error('[query] query processing failed:', err);
    const errResp: ApiErrorResponse = { success: false, message: 'The assistant is temporarily unavailable, please try again later' };
    res.status(500).json(errResp);
  }
});

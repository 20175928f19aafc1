/**
 * INPUT: GET /api/conversations/:userId/summary, GET /api/conversations/:userId/export, DELETE /api/conversations/:userId
 * OUTPUT: conversation summary, transcript download (text or PDF), history deletion
 * POS: API layer, read and clear access to the per-user conversation log
 */

import { Router, Request, Response } from 'express';
import { summarizeConversation } from '../core/conversationLog';
import { deleteSession, findSession } from '../core/sessionStore';
import { ApiErrorResponse, ConversationSummaryResponse } from '../models/query';
import { isLanguage, Language } from '../models/types';
import { exportTranscriptPdf, exportTranscriptText } from '../services/transcriptExporter';

export const conversationRouter = Router();

/** ?language= when valid, else the session's, else French */
function resolveLanguage(query: unknown, fallback: Language | undefined): Language {
  return isLanguage(query) ? query : fallback ?? 'fr';
}

// ─── GET /api/conversations/:userId/summary ─────────────────

conversationRouter.get('/conversations/:userId/summary', (req: Request, res: Response): void => {
  const session = findSession(req.params.userId);
  const language = resolveLanguage(req.query.language, session?.language);
  const turns = session?.turns ?? [];
  const response: ConversationSummaryResponse = {
    success: true,
    summary: summarizeConversation(turns, language),
    turns: turns.length,
  };
  res.json(response);
});

// ─── GET /api/conversations/:userId/export ──────────────────

conversationRouter.get('/conversations/:userId/export', async (req: Request, res: Response): Promise<void> => {
  const format = req.query.format ?? 'text';
  if (format !== 'text' && format !== 'pdf') {
    const errResp: ApiErrorResponse = { success: false, message: 'format must be "text" or "pdf"' };
    res.status(400).json(errResp);
    return;
  }

  const session = findSession(req.params.userId);
  const language = resolveLanguage(req.query.language, session?.language);
  const turns = session?.turns ?? [];

  try {
    if (format === 'text') {
      res.setHeader('Content-Disposition', 'attachment; filename="conversation.txt"');
      res.type('text/plain').send(exportTranscriptText(turns, language));
      return;
    }
    const pdf = await exportTranscriptPdf(turns, language);
    res.setHeader('Content-Disposition', 'attachment; filename="conversation.pdf"');
    res.type('application/pdf').send(Buffer.from(pdf));
  } catch (err) {
    console.error('[conversation] export failed:', err);
    const errResp: ApiErrorResponse = { success: false, message: 'Export failed, please try again later' };
    res.status(500).json(errResp);
  }
});

// ─── DELETE /api/conversations/:userId ──────────────────────

conversationRouter.delete('/conversations/:userId', (req: Request, res: Response): void => {
  const deleted = deleteSession(req.params.userId);
  res.json({ success: true, deleted });
});

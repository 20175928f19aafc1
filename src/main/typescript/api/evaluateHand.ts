/**
 * INPUT: POST /api/evaluate-hand ({ description, language? })
 * OUTPUT: { success: true, evaluation: HandEvaluation }
 * POS: API layer, validation around queryService.evaluateHand
 */

import { Router, Request, Response } from 'express';
import { ApiErrorResponse, EvaluateHandRequest, EvaluateHandResponse } from '../models/query';
import { isLanguage } from '../models/types';
import { evaluateHand } from '../services/queryService';
import { isRecord } from '../utils/validators';

export const evaluateHandRouter = Router();

function validateRequest(body: unknown): { valid: true; req: EvaluateHandRequest } | { valid: false; error: string } {
  if (!isRecord(body)) return { valid: false, error: 'request body must be a JSON object' };

  const description = body['description'];
  if (typeof description !== 'string' || !description.trim()) {
    return { valid: false, error: 'description is required' };
  }
  if (description.length > 500) {
    return { valid: false, error: 'description must not exceed 500 characters' };
  }

  const language = body['language'];
  if (language !== undefined && !isLanguage(language)) {
    return { valid: false, error: 'language must be "fr" or "en"' };
  }

  return { valid: true, req: { description: description.trim(), language: language ?? 'fr' } };
}

evaluateHandRouter.post('/evaluate-hand', (req: Request, res: Response): void => {
  const validation = validateRequest(req.body);
  if (!validation.valid) {
    const errResp: ApiErrorResponse = { success: false, message: validation.error };
    res.status(400).json(errResp);
    return;
  }

  try {
    const evaluation = evaluateHand(validation.req.description, validation.req.language);
    const response: EvaluateHandResponse = { success: true, evaluation };
    res.json(response);
  } catch (err) {
    console.error('[evaluateHand] evaluation failed:', err);
    const errResp: ApiErrorResponse = { success: false, message: 'Hand evaluation failed, please try again later' };
    res.status(500).json(errResp);
  }
});

/**
 * INPUT: none
 * OUTPUT: HTTP request/response types for query, hand evaluation and conversation routes
 * POS: data model layer, API contracts
 */

import { HandEvaluation, Language } from './types';

export interface QueryRequest {
  question: string;
  language?: Language;
  userId?: string;
  context?: string[];
}

export interface QueryResponse {
  success: true;
  answer: string;
  language: Language;
  cached: boolean;
}

export interface EvaluateHandRequest {
  description: string;
  language: Language;
}

export interface EvaluateHandResponse {
  success: true;
  evaluation: HandEvaluation;
}

export interface ConversationSummaryResponse {
  success: true;
  summary: string;
  turns: number;
}

export interface ApiErrorResponse {
  success: false;
  message: string;
}

/**
 * POST /api/query — validation, session bookkeeping, error mapping
 */

import request from 'supertest';
import express from 'express';

jest.mock('../services/queryService');

import { conversationRouter } from '../api/conversation';
import { queryRouter, validateRequest } from '../api/query';
import { deleteSession, findSession } from '../core/sessionStore';
import { IntentLabel, MatchType, TurnSender } from '../models/enums';
import { QueryOutcome } from '../models/types';
import { processQuery } from '../services/queryService';

const mockProcessQuery = processQuery as jest.MockedFunction<typeof processQuery>;

function makeOutcome(overrides: Partial<QueryOutcome> = {}): QueryOutcome {
  return {
    answer: '**🎯 Complete Capot Rules**',
    intent: IntentLabel.CAPOT,
    matchType: MatchType.PATTERN,
    cached: false,
    ...overrides,
  };
}

const app = express();
app.use(express.json());
app.use('/api', queryRouter);
app.use('/api', conversationRouter);

beforeEach(() => {
  mockProcessQuery.mockReset();
  mockProcessQuery.mockResolvedValue(makeOutcome());
});

afterEach(() => {
  deleteSession('U-api');
});

// ─────────────────────────────────────────────────────────────────
describe('POST /api/query — validation', () => {
  test('missing question → 400', async () => {
    const res = await request(app).post('/api/query').send({ language: 'en' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, message: 'question is required' });
    expect(mockProcessQuery).not.toHaveBeenCalled();
  });

  test('blank question → 400', async () => {
    const res = await request(app).post('/api/query').send({ question: '   ' });
    expect(res.status).toBe(400);
  });

  test('question over 500 characters → 400', async () => {
    const res = await request(app).post('/api/query').send({ question: 'a'.repeat(501) });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('question must not exceed 500 characters');
  });

  test('unsupported language → 400', async () => {
    const res = await request(app).post('/api/query').send({ question: 'capot', language: 'de' });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('language must be "fr" or "en"');
  });

  test('context must be a short list of strings', async () => {
    const res = await request(app).post('/api/query').send({ question: 'capot', context: [1, 2] });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('context must be an array of at most 10 strings');
  });

  test('validateRequest trims the question and user id', () => {
    expect(validateRequest({ question: '  capot  ', userId: ' U1 ' })).toEqual({
      valid: true,
      req: { question: 'capot', language: undefined, userId: 'U1', context: undefined },
    });
  });
});

// ─────────────────────────────────────────────────────────────────
describe('POST /api/query — answers', () => {
  test('returns the answer with language and cache flag', async () => {
    mockProcessQuery.mockResolvedValue(makeOutcome({ cached: true }));
    const res = await request(app).post('/api/query').send({ question: 'what is a capot', language: 'en' });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, answer: '**🎯 Complete Capot Rules**', language: 'en', cached: true });
    expect(mockProcessQuery).toHaveBeenCalledWith('what is a capot', 'en', []);
  });

  test('language defaults to French', async () => {
    const res = await request(app).post('/api/query').send({ question: 'capot' });
    expect(res.body.language).toBe('fr');
  });

  test('explicit context is passed through', async () => {
    await request(app).post('/api/query').send({ question: 'et ensuite ?', context: ['comment marche le capot'] });
    expect(mockProcessQuery).toHaveBeenCalledWith('et ensuite ?', 'fr', ['comment marche le capot']);
  });

  test('a user session remembers language and recent questions', async () => {
    await request(app).post('/api/query').send({ question: 'what is a capot', language: 'en', userId: 'U-api' });
    await request(app).post('/api/query').send({ question: 'and then?', userId: 'U-api' });

    expect(mockProcessQuery).toHaveBeenLastCalledWith('and then?', 'en', ['what is a capot']);
    const session = findSession('U-api');
    expect(session?.language).toBe('en');
    expect(session?.turns.map((t) => t.sender)).toEqual([
      TurnSender.USER,
      TurnSender.SYSTEM,
      TurnSender.USER,
      TurnSender.SYSTEM,
    ]);
  });

  test('pipeline failure → 500', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockProcessQuery.mockRejectedValue(new Error('rules missing'));
    const res = await request(app).post('/api/query').send({ question: 'capot', userId: 'U-api' });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      success: false,
      message: 'The assistant is temporarily unavailable, please try again later',
    });
    expect(findSession('U-api')?.turns).toEqual([]);
  });

  test('history deleted while a question is in flight stays deleted', async () => {
    await request(app).post('/api/query').send({ question: 'what is a capot', userId: 'U-api' });

    let release: (outcome: QueryOutcome) => void = () => undefined;
    mockProcessQuery.mockReturnValueOnce(new Promise<QueryOutcome>((resolve) => { release = resolve; }));
    const pending = request(app).post('/api/query').send({ question: 'and belote?', userId: 'U-api' }).then((r) => r);
    for (let i = 0; i < 100 && mockProcessQuery.mock.calls.length < 2; i++) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    expect(mockProcessQuery).toHaveBeenCalledTimes(2);

    const del = await request(app).delete('/api/conversations/U-api');
    expect(del.body).toEqual({ success: true, deleted: true });

    release(makeOutcome());
    const res = await pending;
    expect(res.status).toBe(200);
    expect(findSession('U-api')).toBeNull();

    const summary = await request(app).get('/api/conversations/U-api/summary');
    expect(summary.body.turns).toBe(0);
  });
});

/**
 * INPUT: environment variables (.env), HTTP requests, LINE webhook events
 * OUTPUT: Express HTTP server (query API, hand evaluation, conversations, LINE bot)
 * POS: application entry point, wires routers and middleware
 */

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { getAppConfig } from './config/appConfig';
import { createLineMiddleware } from './core/lineClient';
import webhookRouter from './api/webhook';
import { queryRouter } from './api/query';
import { evaluateHandRouter } from './api/evaluateHand';
import { conversationRouter } from './api/conversation';
import { getQueryRouter } from './services/queryService';

const config = getAppConfig();
const app = express();

// LINE webhook must come before express.json(): the SDK verifies the raw body
if (config.line.channelSecret) {
  app.use('/api/webhook', createLineMiddleware(config.line.channelSecret), webhookRouter);
} else {
  console.warn('[index] LINE_CHANNEL_SECRET not set, /api/webhook disabled');
}

app.use(express.json());

// public API, callable from any front end
app.use('/api', (_req, res, next) => {
  res.header('Access-Control-Allow-Origin', '*');
  res.header('Access-Control-Allow-Headers', 'Content-Type');
  res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  next();
});
app.options('/api/*', (_req, res) => res.sendStatus(200));
app.use('/api', queryRouter);
app.use('/api', evaluateHandRouter);
app.use('/api', conversationRouter);

app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'contree-coach' });
});

// malformed data files are fatal: build the pipeline before accepting traffic
getQueryRouter()
  .then((router) => {
    app.listen(config.port, () => {
      console.log('🃏 Contrée Coach started');
      console.log(`📡 listening on http://localhost:${config.port}`);
      console.log(`🔎 semantic search: ${router.semanticEnabled ? 'on' : 'off'}`);
    });
  })
  .catch((err: unknown) => {
    console.error('[index] failed to load rule data:', err);
    process.exit(1);
  });

/**
 * INPUT: AppConfig.line (channel access token, channel secret)
 * OUTPUT: LINE Messaging API client singleton, webhook signature middleware
 * POS: core module, LINE SDK access; nothing is created until first use
 */

import { messagingApi, middleware } from '@line/bot-sdk';
import { RequestHandler } from 'express';
import { getAppConfig } from '../config/appConfig';

let client: messagingApi.MessagingApiClient | null = null;

/** LINE Messaging API client */
export function getLineClient(): messagingApi.MessagingApiClient {
  if (!client) {
    client = new messagingApi.MessagingApiClient({
      channelAccessToken: getAppConfig().line.channelAccessToken,
    });
  }
  return client;
}

/** Webhook signature middleware; the SDK throws on an empty secret */
export function createLineMiddleware(channelSecret: string): RequestHandler {
  return middleware({ channelSecret });
}

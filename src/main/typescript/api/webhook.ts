/**
 * INPUT: LINE webhook events (WebhookEvent)
 * OUTPUT: replies to LINE users
 * POS: API layer, receives LINE platform events and delegates to conversationHandler
 */

import { Router, Request, Response } from 'express';
import { WebhookEvent } from '@line/bot-sdk';
import { handleEvent } from '../services/conversationHandler';

const router = Router();

/** POST /api/webhook — LINE webhook events */
router.post('/', async (req: Request, res: Response) => {
  const events: WebhookEvent[] = Array.isArray(req.body?.events) ? req.body.events : [];

  // LINE retries on anything but 200, which would duplicate replies
  res.json({ success: true });

  // one failing event must not affect the others
  await Promise.all(events.map(async (event) => {
    try {
      await handleEvent(event);
    } catch (err) {
      console.error('[webhook] event handling failed:', err);
    }
  }));
});

export default router;

import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { DecisionChannel, ReviewerAction } from '../approval/channel.js';
import { parseActionId } from '../integrations/slack.js';
import { requireSlackSignature } from '../middleware/slack-signature.js';
import { manualTriggerLimiter, slackWebhookLimiter } from '../middleware/rate-limit.js';
import {
  interactionBodySchema,
  parseBlockActions,
  slackEventSchema,
  slashCommandSchema,
  validate,
} from '../middleware/validation.js';

export interface SlackRouterDeps {
  channel: DecisionChannel;
  signingSecret: string;
  rateLimit?: boolean;
}

const noLimit: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

export function createSlackRouter({ channel, signingSecret, rateLimit = true }: SlackRouterDeps): Router {
  const router = Router();
  const webhookLimit = rateLimit ? slackWebhookLimiter : noLimit;
  const triggerLimit = rateLimit ? manualTriggerLimiter : noLimit;

  router.use(requireSlackSignature(signingSecret));

  // POST /slack/actions — Approve / Edit / Deny button presses
  router.post('/actions', webhookLimit, validate(interactionBodySchema), async (req: Request, res: Response) => {
    const { payload: raw } = interactionBodySchema.parse(req.body);
    const parsed = parseBlockActions(raw);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error });
    }

    const payload = parsed.data;
    const target = parseActionId(payload.actions[0].action_id);
    if (!target) {
      return res.status(400).json({ error: 'Invalid action' });
    }

    const action: ReviewerAction = {
      draftId: target.draftId,
      reviewerId: payload.user.id,
      userId: payload.user.name ?? payload.user.username ?? payload.user.id,
      message: { channel: payload.channel.id, ts: payload.message.ts },
    };

    try {
      const result =
        target.verb === 'approve' ? await channel.onApprove(action)
        : target.verb === 'deny' ? await channel.onDeny(action)
        : await channel.onEdit(action);

      res.json(result);
    } catch (error) {
      console.error('[Slack] Error handling action:', error);
      res.status(500).json({ error: 'Failed to process action' });
    }
  });

  // POST /slack/events — Events API: URL verification and reviewer messages
  router.post('/events', webhookLimit, validate(slackEventSchema), async (req: Request, res: Response) => {
    const body = slackEventSchema.parse(req.body);

    if (body.type === 'url_verification') {
      return res.json({ challenge: body.challenge });
    }

    // Slack redelivers events it considers unacknowledged; the first
    // delivery was already handled.
    if (req.get('x-slack-retry-num')) {
      return res.json({ ok: true, ignored: 'retry' });
    }

    const event = body.event;
    if (event.type !== 'message' || event.bot_id || event.subtype || !event.user || !event.channel || !event.text) {
      return res.json({ ok: true, ignored: 'not a reviewer message' });
    }

    try {
      const result = await channel.onFreeText({ channel: event.channel, userId: event.user, text: event.text });
      res.json({ ok: true, ...result });
    } catch (error) {
      console.error('[Slack] Error handling message event:', error);
      res.status(500).json({ error: 'Failed to process message' });
    }
  });

  // POST /slack/commands — slash command asking for a post right now
  router.post('/commands', triggerLimit, validate(slashCommandSchema), (req: Request, res: Response) => {
    const command = slashCommandSchema.parse(req.body);
    const result = channel.onManualTrigger({ channel: command.channel_id, userId: command.user_id });

    res.json({ response_type: 'ephemeral', text: result.message });
  });

  return router;
}

import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ZodSchema } from 'zod';

export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: 'Validation failed',
        details: formatIssues(result.error),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}

export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// Interactive payloads arrive form-encoded as a JSON string in `payload`.
export const blockActionsSchema = z.object({
  type: z.literal('block_actions'),
  user: z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    username: z.string().optional(),
  }),
  channel: z.object({ id: z.string().min(1) }),
  message: z.object({ ts: z.string().min(1) }),
  actions: z
    .array(z.object({ action_id: z.string().min(1), value: z.string().optional() }))
    .min(1, 'No action provided'),
});

export type BlockActionsPayload = z.infer<typeof blockActionsSchema>;

export const interactionBodySchema = z.object({
  payload: z.string().min(1, 'Payload is required'),
});

export const slashCommandSchema = z.object({
  command: z.string().min(1),
  user_id: z.string().min(1, 'user_id is required'),
  channel_id: z.string().min(1, 'channel_id is required'),
  text: z.string().optional(),
});

const messageEventSchema = z.object({
  type: z.string(),
  user: z.string().optional(),
  text: z.string().optional(),
  channel: z.string().optional(),
  channel_type: z.string().optional(),
  bot_id: z.string().optional(),
  subtype: z.string().optional(),
});

export const slackEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('url_verification'), challenge: z.string() }),
  z.object({ type: z.literal('event_callback'), event: messageEventSchema }),
]);

// Parses the JSON string inside an interaction body.
export function parseBlockActions(raw: string):
  | { success: true; data: BlockActionsPayload }
  | { success: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { success: false, error: 'Payload is not valid JSON' };
  }

  const result = blockActionsSchema.safeParse(json);
  if (!result.success) {
    return { success: false, error: result.error.issues[0]?.message ?? 'Invalid payload' };
  }
  return { success: true, data: result.data };
}

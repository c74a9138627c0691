import { WebClient } from '@slack/web-api';
import type { KnownBlock } from '@slack/web-api';
import crypto from 'crypto';
import path from 'path';
import type { MessageRef, ReviewerMessenger } from '../approval/channel.js';
import type { SlackConfig } from '../config.js';
import type { Draft } from '../types.js';

export type ReviewVerb = 'approve' | 'edit' | 'deny';

const VERBS: readonly ReviewVerb[] = ['approve', 'edit', 'deny'];

export function actionIdFor(verb: ReviewVerb, draftId: string): string {
  return `${verb}_${draftId}`;
}

// Draft ids contain underscores themselves, so only the first one separates
// the verb.
export function parseActionId(actionId: string): { verb: ReviewVerb; draftId: string } | null {
  const separator = actionId.indexOf('_');
  if (separator <= 0) return null;
  const verb = VERBS.find(candidate => candidate === actionId.slice(0, separator));
  const draftId = actionId.slice(separator + 1);
  return verb && draftId ? { verb, draftId } : null;
}

export function draftBlocks(draft: Draft): KnownBlock[] {
  return [
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*🐧 New post for approval*\n\n${draft.text}\n\n_Approve to post as-is, Edit to change the text, or Deny to skip._`,
      },
    },
    {
      type: 'actions',
      block_id: `review_${draft.id}`,
      elements: [
        {
          type: 'button',
          text: { type: 'plain_text', text: '✅ Approve' },
          style: 'primary',
          value: draft.id,
          action_id: actionIdFor('approve', draft.id),
        },
        {
          type: 'button',
          text: { type: 'plain_text', text: '✏️ Edit' },
          value: draft.id,
          action_id: actionIdFor('edit', draft.id),
        },
        {
          type: 'button',
          text: { type: 'plain_text', text: '❌ Deny' },
          style: 'danger',
          value: draft.id,
          action_id: actionIdFor('deny', draft.id),
        },
      ],
    },
  ];
}

function statusBlocks(text: string): KnownBlock[] {
  return [{ type: 'section', text: { type: 'mrkdwn', text } }];
}

export class SlackReviewerMessenger implements ReviewerMessenger {
  private readonly client: WebClient;
  private readonly channel: string;

  constructor(config: Pick<SlackConfig, 'botToken' | 'channel'>, client?: WebClient) {
    this.client = client ?? new WebClient(config.botToken, { timeout: 30_000 });
    this.channel = config.channel;
  }

  // The preview goes up as a file first; the interactive message follows it
  // because Slack file shares cannot carry buttons.
  async postDraft(draft: Draft): Promise<MessageRef> {
    await this.client.files.uploadV2({
      channel_id: this.channel,
      file: draft.imagePath,
      filename: path.basename(draft.imagePath),
      title: `Preview for draft ${draft.id}`,
    });

    const result = await this.client.chat.postMessage({
      channel: this.channel,
      text: `New post for approval: ${draft.text}`,
      blocks: draftBlocks(draft),
    });

    if (!result.ts) {
      throw new Error('Slack did not return a message timestamp');
    }
    return { channel: result.channel ?? this.channel, ts: result.ts };
  }

  async updateMessage(ref: MessageRef, text: string): Promise<void> {
    await this.client.chat.update({
      channel: ref.channel,
      ts: ref.ts,
      text,
      blocks: statusBlocks(text),
    });
  }

  async send(text: string, channel?: string): Promise<void> {
    await this.client.chat.postMessage({ channel: channel ?? this.channel, text });
  }
}

export function verifySlackSignature(
  signingSecret: string,
  slackSignature: string,
  timestamp: string,
  body: string,
  now: number = Date.now()
): boolean {
  // Prevent replay attacks - reject requests older than 5 minutes
  const sent = Number.parseInt(timestamp, 10);
  if (!Number.isFinite(sent) || Math.abs(Math.floor(now / 1000) - sent) > 300) {
    return false;
  }

  const sigBasestring = `v0:${timestamp}:${body}`;
  const expected = Buffer.from(
    'v0=' + crypto.createHmac('sha256', signingSecret).update(sigBasestring).digest('hex')
  );
  const received = Buffer.from(slackSignature);

  // timingSafeEqual throws on length mismatch
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

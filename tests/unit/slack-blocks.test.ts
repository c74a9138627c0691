import { describe, it, expect } from 'vitest';
import { actionIdFor, draftBlocks, parseActionId } from '@/integrations/slack.js';
import type { Draft } from '@/types.js';

const draft: Draft = {
  id: '20260101_120000',
  text: 'gm wagmi',
  imagePath: '/tmp/preview.png',
  createdAt: '2026-01-01T12:00:00.000Z',
};

describe('action ids', () => {
  it('round-trips verb and draft id even though ids contain underscores', () => {
    expect(actionIdFor('edit', draft.id)).toBe('edit_20260101_120000');
    expect(parseActionId('edit_20260101_120000')).toEqual({ verb: 'edit', draftId: '20260101_120000' });
  });

  it('keeps a same-second suffix as part of the id', () => {
    expect(parseActionId('deny_20260101_120000-2')).toEqual({ verb: 'deny', draftId: '20260101_120000-2' });
  });

  it.each(['publish_123', 'approve_', 'approve', '_123', ''])('rejects %j', actionId => {
    expect(parseActionId(actionId)).toBeNull();
  });
});

describe('draftBlocks', () => {
  it('renders the text and three tagged buttons', () => {
    const [section, actions] = draftBlocks(draft);

    expect(section).toEqual({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: '*🐧 New post for approval*\n\ngm wagmi\n\n_Approve to post as-is, Edit to change the text, or Deny to skip._',
      },
    });
    expect(actions.type).toBe('actions');
    if (actions.type !== 'actions') return;
    expect(actions.elements.map(element => ('action_id' in element ? element.action_id : undefined))).toEqual([
      'approve_20260101_120000',
      'edit_20260101_120000',
      'deny_20260101_120000',
    ]);
    expect(actions.elements.map(element => ('value' in element ? element.value : undefined))).toEqual([
      draft.id,
      draft.id,
      draft.id,
    ]);
  });
});

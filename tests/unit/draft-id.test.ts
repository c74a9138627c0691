import { describe, it, expect } from 'vitest';
import { DraftIdSequence, draftIdFor } from '@/approval/draft-id.js';

describe('draftIdFor', () => {
  it('formats the UTC creation time', () => {
    expect(draftIdFor(new Date('2026-03-04T05:06:07.890Z'))).toBe('20260304_050607');
  });
});

describe('DraftIdSequence', () => {
  it('suffixes ids issued within the same second', () => {
    const ids = new DraftIdSequence();
    const now = new Date('2026-03-04T05:06:07Z');

    expect(ids.next(now)).toBe('20260304_050607');
    expect(ids.next(now)).toBe('20260304_050607-2');
    expect(ids.next(now)).toBe('20260304_050607-3');
    expect(ids.next(new Date('2026-03-04T05:06:08Z'))).toBe('20260304_050608');
  });
});

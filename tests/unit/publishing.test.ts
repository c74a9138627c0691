import { describe, it, expect } from 'vitest';
import { describeImage } from '@/media/image.js';
import { DryRunPublisher } from '@/publishing/dry-run.js';

describe('describeImage', () => {
  it('returns the trimmed prompt when there are no captions', () => {
    expect(describeImage('  a robot penguin on an iceberg ')).toBe('a robot penguin on an iceberg');
  });

  it('asks for the captions that are present', () => {
    expect(describeImage('a robot penguin', { bottom: 'IS NICE' })).toBe(
      'a robot penguin Render the caption "IS NICE" in bold meme-style letters across the bottom.'
    );
  });

  it('orders the top caption before the bottom one', () => {
    const prompt = describeImage('a robot penguin', { top: 'WHEN THE ICE', bottom: 'IS NICE' });

    expect(prompt.indexOf('WHEN THE ICE')).toBeLessThan(prompt.indexOf('IS NICE'));
  });
});

describe('DryRunPublisher', () => {
  it('returns a fresh id for every post', async () => {
    const publisher = new DryRunPublisher();

    await expect(publisher.publish('gm', '/tmp/a.png')).resolves.toEqual({ id: 'dry-run-1' });
    await expect(publisher.publish('gn', '/tmp/b.png')).resolves.toEqual({ id: 'dry-run-2' });
  });
});

import { ApiResponseError, TwitterApi } from 'twitter-api-v2';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import type { TwitterCredentials } from '../config.js';
import { PublishFailed } from '../errors.js';
import type { Publisher, PublishResult } from '../types.js';

const twitterCircuit = new CircuitBreaker({
  serviceName: 'twitter',
  failureThreshold: 3,
  resetTimeoutMs: 60_000,  // 1 minute
  successThreshold: 1,
});

// Narrow surface of twitter-api-v2 the publisher needs; tests pass a fake.
export interface TwitterClientLike {
  uploadMedia(imagePath: string): Promise<string>;
  tweet(text: string, mediaId: string): Promise<string | undefined>;
}

function wrapClient(credentials: TwitterCredentials): TwitterClientLike {
  const client = new TwitterApi(credentials);
  return {
    uploadMedia: imagePath => client.v1.uploadMedia(imagePath),
    tweet: async (text, mediaId) => {
      const result = await client.v2.tweet({ text, media: { media_ids: [mediaId] } });
      return result.data?.id;
    },
  };
}

export function describeTwitterError(error: unknown): string {
  if (error instanceof ApiResponseError) {
    if (error.code === 401) return 'Twitter authentication failed. Check API credentials.';
    if (error.code === 429) return 'Twitter rate limit exceeded. Please try again later.';
    if (error.data.detail?.includes('duplicate')) return 'This post appears to be a duplicate.';
  }
  return 'Failed to post to Twitter';
}

export class TwitterPublisher implements Publisher {
  private readonly client: TwitterClientLike;
  private readonly circuit: CircuitBreaker;

  constructor(options: { credentials?: TwitterCredentials; client?: TwitterClientLike; circuit?: CircuitBreaker }) {
    if (options.client) {
      this.client = options.client;
    } else if (options.credentials) {
      this.client = wrapClient(options.credentials);
    } else {
      throw new Error('Twitter API credentials are not configured');
    }
    this.circuit = options.circuit ?? twitterCircuit;
  }

  async publish(text: string, imagePath: string): Promise<PublishResult> {
    try {
      return await this.circuit.execute(async () => {
        const mediaId = await this.client.uploadMedia(imagePath);
        const id = await this.client.tweet(text, mediaId);
        if (!id) {
          throw new Error('Tweet posted but no ID returned');
        }
        return { id };
      });
    } catch (error) {
      console.error('[Twitter] Posting error:', error);
      throw new PublishFailed(describeTwitterError(error), { cause: error });
    }
  }
}

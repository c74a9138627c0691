import type { Publisher, PublishResult } from '../types.js';

// Stand-in publisher for DRY_RUN=true: logs what would have been posted.
export class DryRunPublisher implements Publisher {
  private count = 0;

  async publish(text: string, imagePath: string): Promise<PublishResult> {
    this.count++;
    console.log(`[DryRun] Would post: ${text}`);
    console.log(`[DryRun] With image: ${imagePath}`);
    return { id: `dry-run-${this.count}` };
  }
}

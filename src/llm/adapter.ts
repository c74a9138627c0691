import type { GeneratedContent } from '../types.js';

export interface ContentGenerator {
  /** `history` holds previously published texts, oldest first. */
  generate(history: readonly string[]): Promise<GeneratedContent>;
}

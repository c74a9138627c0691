import type { ContentGenerator } from './adapter.js';
import { ChatContentGenerator } from './openai.js';
import type { AppConfig } from '../config.js';

// Both supported providers speak the OpenAI chat-completions protocol; xAI
// only differs by base URL and default model (see config.ts).
export function createContentGenerator(config: AppConfig): ContentGenerator {
  switch (config.llm.provider) {
    case 'openai':
    case 'xai':
      return new ChatContentGenerator({
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        baseURL: config.llm.baseURL,
        persona: config.persona,
        historyContextSize: config.historyContextSize,
        maxLength: config.postMaxLength,
      });

    default: {
      const _exhaustive: never = config.llm.provider;
      throw new Error(`Unsupported LLM provider: ${String(_exhaustive)}`);
    }
  }
}

export * from './adapter.js';

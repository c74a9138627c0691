import OpenAI from 'openai';
import type { ContentGenerator } from './adapter.js';
import { buildPrompt, parseGeneratedPost } from './parse.js';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { GenerationFailed } from '../errors.js';
import type { GeneratedContent } from '../types.js';

// Module-level singleton — shared across all generator instances
const llmCircuit = new CircuitBreaker({
  serviceName: 'llm',
  failureThreshold: 3,
  resetTimeoutMs: 120_000,  // 2 minutes — LLM outages recover slower
  successThreshold: 2,
});

export interface ChatContentGeneratorOptions {
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint, e.g. https://api.x.ai/v1 */
  baseURL?: string;
  persona: string;
  historyContextSize: number;
  maxLength: number;
  maxTokens?: number;
  client?: OpenAI;
  circuit?: CircuitBreaker;
}

export class ChatContentGenerator implements ContentGenerator {
  private readonly client: OpenAI;
  private readonly circuit: CircuitBreaker;

  constructor(private readonly options: ChatContentGeneratorOptions) {
    this.circuit = options.circuit ?? llmCircuit;
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: 60_000,
    });
  }

  async generate(history: readonly string[]): Promise<GeneratedContent> {
    const context = this.options.historyContextSize > 0
      ? history.slice(-this.options.historyContextSize)
      : [];
    const prompt = buildPrompt(this.options.persona, context, this.options.maxLength);

    let content: string;
    try {
      content = await this.circuit.execute(async () => {
        const response = await this.client.chat.completions.create({
          model: this.options.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: this.options.maxTokens ?? 300,
          temperature: 0.9,
        });
        return response.choices[0]?.message?.content ?? '';
      });
    } catch (error) {
      console.error('[LLM] Generation request failed:', error);
      throw new GenerationFailed('Unable to generate content right now', { cause: error });
    }

    if (!content.trim()) {
      throw new GenerationFailed(`No content returned by ${this.options.model}`);
    }

    return parseGeneratedPost(content, this.options.maxLength);
  }
}

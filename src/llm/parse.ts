import { GenerationFailed } from '../errors.js';
import type { GeneratedContent } from '../types.js';

type Field = 'text' | 'imagePrompt' | 'overlayTop' | 'overlayBottom';

const LABELS = new Map<string, Field>([
  ['post', 'text'],
  ['tweet', 'text'],
  ['image prompt', 'imagePrompt'],
  ['top text', 'overlayTop'],
  ['bottom text', 'overlayBottom'],
]);

function fieldFor(label: string): Field | undefined {
  return LABELS.get(label.trim().toLowerCase());
}

/**
 * Parses a model answer of the form
 *
 *   Post: <text>
 *   Image prompt: <prompt>
 *   Top text: <optional caption>
 *   Bottom text: <optional caption>
 *
 * Labels are case-insensitive and may be wrapped in markdown bold. A value
 * may continue over following unlabelled lines.
 */
export function parseGeneratedPost(raw: string, maxLength: number): GeneratedContent {
  const values: Partial<Record<Field, string>> = {};
  let current: Field | undefined;

  for (const line of raw.split(/\r?\n/)) {
    const match = /^\s*\**\s*([A-Za-z ]+?)\s*\**\s*:\s*\**\s*(.*)$/.exec(line);
    const field = match ? fieldFor(match[1]) : undefined;
    if (match && field) {
      current = field;
      values[field] = match[2].trim();
    } else if (current && line.trim()) {
      values[current] = `${values[current] ?? ''} ${line.trim()}`.trim();
    }
  }

  const text = stripQuotes(values.text ?? '');
  const imagePrompt = values.imagePrompt ?? '';

  if (!text) {
    throw new GenerationFailed('Model response is missing the post text');
  }
  if (!imagePrompt) {
    throw new GenerationFailed('Model response is missing the image prompt');
  }
  if (text.length > maxLength) {
    throw new GenerationFailed(`Generated post is ${text.length} characters, limit is ${maxLength}`);
  }

  const content: GeneratedContent = { text, imagePrompt };
  const top = caption(values.overlayTop);
  const bottom = caption(values.overlayBottom);
  if (top) content.overlayTop = top;
  if (bottom) content.overlayBottom = bottom;
  return content;
}

const EMPTY_CAPTIONS = new Set(['', 'none', 'n/a', '-', '<optional caption>']);

function caption(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const cleaned = stripQuotes(value);
  return EMPTY_CAPTIONS.has(cleaned.toLowerCase()) ? undefined : cleaned;
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  const quoted = /^(["“])(.*)(["”])$/s.exec(trimmed);
  return quoted ? quoted[2].trim() : trimmed;
}

export function buildPrompt(persona: string, history: readonly string[], maxLength: number): string {
  const previous = history.length > 0 ? history.join('\n') : 'No previous posts.';
  return `${persona}
Previous posts:
${previous}

Write a new post (at most ${maxLength} characters) and a prompt for a cute image that goes with it.
Optionally add a short caption for the top and/or bottom of the image.
Answer in exactly this format:
Post: <text>
Image prompt: <prompt>
Top text: <optional caption>
Bottom text: <optional caption>`;
}

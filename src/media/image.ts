import fs from 'fs/promises';
import path from 'path';
import OpenAI from 'openai';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { ImageFailed } from '../errors.js';
import type { ImageOverlay, ImageSynthesizer } from '../types.js';

const imageCircuit = new CircuitBreaker({
  serviceName: 'openai-images',
  failureThreshold: 3,
  resetTimeoutMs: 120_000,
  successThreshold: 1,
});

export interface OpenAIImageSynthesizerOptions {
  apiKey: string;
  model: string;
  /** Directory the preview files are written to */
  dir: string;
  client?: OpenAI;
  circuit?: CircuitBreaker;
  fetchImage?: (url: string) => Promise<Buffer>;
}

export function describeImage(imagePrompt: string, overlay?: ImageOverlay): string {
  const parts = [imagePrompt.trim()];
  if (overlay?.top) parts.push(`Render the caption "${overlay.top}" in bold meme-style letters across the top.`);
  if (overlay?.bottom) parts.push(`Render the caption "${overlay.bottom}" in bold meme-style letters across the bottom.`);
  return parts.join(' ');
}

async function download(url: string): Promise<Buffer> {
  const response = await fetch(url, { signal: AbortSignal.timeout(60_000) });
  if (!response.ok) {
    throw new Error(`Image download failed with status ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

export class OpenAIImageSynthesizer implements ImageSynthesizer {
  private readonly client: OpenAI;
  private readonly circuit: CircuitBreaker;
  private readonly fetchImage: (url: string) => Promise<Buffer>;

  constructor(private readonly options: OpenAIImageSynthesizerOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, timeout: 120_000 });
    this.circuit = options.circuit ?? imageCircuit;
    this.fetchImage = options.fetchImage ?? download;
  }

  async render(imagePrompt: string, overlay?: ImageOverlay): Promise<string> {
    let image: Buffer;
    try {
      image = await this.circuit.execute(async () => {
        const response = await this.client.images.generate({
          model: this.options.model,
          prompt: describeImage(imagePrompt, overlay),
          n: 1,
          size: '1024x1024',
        });

        const first = response.data[0];
        if (first?.b64_json) return Buffer.from(first.b64_json, 'base64');
        if (first?.url) return this.fetchImage(first.url);
        throw new Error('Image response contained neither data nor a URL');
      });
    } catch (error) {
      console.error('[Images] Image generation failed:', error);
      throw new ImageFailed('Unable to generate the preview image', { cause: error });
    }

    const file = path.join(this.options.dir, `draft-${Date.now()}.png`);
    try {
      await fs.mkdir(this.options.dir, { recursive: true });
      await fs.writeFile(file, image);
    } catch (error) {
      throw new ImageFailed(`Unable to write preview image to ${file}`, { cause: error });
    }
    return file;
  }
}

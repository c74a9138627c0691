export interface Draft {
  id: string;
  text: string;
  imagePath: string;
  createdAt: string;
}

export type Decision =
  | { action: 'approve'; draftId: string; finalText: string; decidedBy?: string }
  | { action: 'deny'; draftId: string; decidedBy?: string }
  | { action: 'timeout'; draftId: string };

export interface GeneratedContent {
  text: string;
  imagePrompt: string;
  overlayTop?: string;
  overlayBottom?: string;
}

export interface ImageOverlay {
  top?: string;
  bottom?: string;
}

export interface PublishResult {
  id: string;
}

export interface Publisher {
  publish(text: string, imagePath: string): Promise<PublishResult>;
}

export interface ImageSynthesizer {
  render(imagePrompt: string, overlay?: ImageOverlay): Promise<string>;
}

export type ApprovalPolicy = 'required' | 'optional' | 'disabled';

export interface IntervalRange {
  minMs: number;
  maxMs: number;
}

export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Upstream text generation failed or answered without the expected fields. */
export class GenerationFailed extends AppError {}

export class ImageFailed extends AppError {}

/** The review surface could not be reached. Not terminal for the draft. */
export class ChannelUnavailable extends AppError {}

export class PublishFailed extends AppError {}

export class StoreIOError extends AppError {}

export class ApprovalAborted extends AppError {
  constructor(draftId: string) {
    super(`Approval wait for draft ${draftId} was aborted`);
  }
}

export class ConfigError extends AppError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid cycle transition ${from} → ${to}`);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const pad = (value: number) => String(value).padStart(2, '0');

// YYYYMMDD_HHMMSS in UTC
export function draftIdFor(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

// Ids issued within the same second get a -2, -3, … suffix.
export class DraftIdSequence {
  private lastBase = '';
  private repeat = 0;

  next(now: Date = new Date()): string {
    const base = draftIdFor(now);
    if (base === this.lastBase) {
      this.repeat++;
      return `${base}-${this.repeat}`;
    }
    this.lastBase = base;
    this.repeat = 1;
    return base;
  }
}

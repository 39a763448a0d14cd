import type { RunLogLine, RunObserver } from './types.js';

/** Keeps the most recent lines of the current run for presenters that poll. */
export class LogBuffer implements RunObserver {
  private lines: RunLogLine[] = [];

  constructor(private readonly capacity: number) {}

  onLine(line: RunLogLine): void {
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }
  }

  /** Lines with seq greater than afterSeq; pass -1 for everything still buffered. */
  since(afterSeq: number): RunLogLine[] {
    return this.lines.filter(l => l.seq > afterSeq);
  }

  get size(): number {
    return this.lines.length;
  }

  clear(): void {
    this.lines = [];
  }
}

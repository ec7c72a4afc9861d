/**
 * Console progress bar, one line per step. Silent unless verbose.
 */
export class ProgressTracker {
  private done = 0;

  constructor(
    private readonly total: number,
    private readonly verbose = true,
    private readonly write: (line: string) => void = (line) => console.log(line),
  ) {}

  get percent(): number {
    return this.total > 0 ? Math.min(100, (this.done / this.total) * 100) : 100;
  }

  tick(message: string): void {
    this.done += 1;
    if (!this.verbose) return;
    this.write(formatProgress(this.percent, message));
  }
}

export function formatProgress(percent: number, message: string, barLength = 20): string {
  const filled = Math.round(barLength * (percent / 100));
  const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled);
  return `[${bar}] ${percent.toFixed(0)}% - ${message}`;
}

/**
 * Progress bar for the hashing phase
 */

export interface ProgressOptions {
  total: number;
  label?: string;
  width?: number;
  /** Defaults to stdout; pass another writable to capture output */
  stream?: NodeJS.WritableStream;
  now?: () => number;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  /** Seconds */
  elapsed: number;
  eta: number;
  rate: number;
  isComplete: boolean;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.round(seconds % 60);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${mins}m`;
}

export class ProgressTracker {
  private current = 0;
  private total: number;
  private readonly label: string;
  private readonly width: number;
  private readonly stream: NodeJS.WritableStream;
  private readonly now: () => number;
  private readonly startTime: number;
  private lastRender = Number.NEGATIVE_INFINITY;
  private readonly renderIntervalMs = 100;

  constructor(options: ProgressOptions) {
    this.total = options.total;
    this.label = options.label ?? 'Progress';
    this.width = options.width ?? 20;
    this.stream = options.stream ?? process.stdout;
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  /**
   * Matches the engines' `onProgress(done, total)` callbacks
   */
  update(done: number, total: number = this.total): void {
    this.total = total;
    this.current = Math.min(Math.max(done, 0), this.total);
    this.render();
  }

  complete(): void {
    this.current = this.total;
    this.render(true);
    this.stream.write('\n');
  }

  getStats(): ProgressStats {
    const elapsed = (this.now() - this.startTime) / 1000;
    const rate = elapsed > 0 ? this.current / elapsed : 0;
    const remaining = this.total - this.current;

    return {
      current: this.current,
      total: this.total,
      percent: this.total > 0 ? (this.current / this.total) * 100 : 100,
      elapsed: Math.round(elapsed),
      eta: rate > 0 ? Math.round(remaining / rate) : 0,
      rate: Math.round(rate * 10) / 10,
      isComplete: this.current >= this.total,
    };
  }

  formatLine(): string {
    const stats = this.getStats();
    const filled = Math.round((stats.percent / 100) * this.width);
    const parts = [
      `${this.label}:`,
      `[${'█'.repeat(filled)}${'░'.repeat(this.width - filled)}]`,
      `${stats.current}/${stats.total}`,
      `${Math.round(stats.percent)}%`,
      formatDuration(stats.elapsed),
    ];

    if (stats.current > 0 && !stats.isComplete) {
      parts.push(`ETA ${formatDuration(stats.eta)}`, `${stats.rate} files/s`);
    }
    return parts.join(' ');
  }

  private render(force = false): void {
    const now = this.now();
    if (!force && now - this.lastRender < this.renderIntervalMs && this.current < this.total) {
      return;
    }
    this.lastRender = now;
    this.stream.write(`\r${' '.repeat(100)}\r${this.formatLine()}`);
  }
}

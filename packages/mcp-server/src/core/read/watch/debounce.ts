/**
 * Trailing-edge debounce for watcher events
 *
 * Every push restarts the timer; when it fires, the handler gets the set of
 * paths touched since the last flush.
 */

export type FlushHandler = (paths: string[]) => void;

export class DebouncedBatch {
  private readonly pending = new Set<string>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly onFlush: FlushHandler
  ) {}

  push(filePath: string): void {
    this.pending.add(filePath);
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => this.flush(), this.delayMs);
  }

  /** Deliver pending paths now */
  flush(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.size === 0) {
      return;
    }
    const paths = Array.from(this.pending).sort();
    this.pending.clear();
    this.onFlush(paths);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Drop pending paths without delivering them */
  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending.clear();
  }
}

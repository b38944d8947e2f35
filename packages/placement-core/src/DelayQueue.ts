type PendingAction = {
  dueFrame: number;
  run: () => void;
};

/**
 * Frame-counted scheduler: an action scheduled with offset N runs on the
 * N-th `flush` after the current one, never by waiting.
 */
export class DelayQueue {
  private frame = 0;
  private pending: PendingAction[] = [];

  schedule(run: () => void, frameOffset = 0): void {
    this.pending.push({ dueFrame: this.frame + Math.max(0, Math.floor(frameOffset)), run });
  }

  /** Runs every action due at or before the current frame, in scheduling order. */
  flush(): number {
    const due = this.pending.filter((action) => action.dueFrame <= this.frame);
    if (!due.length) return 0;
    this.pending = this.pending.filter((action) => action.dueFrame > this.frame);
    due.forEach((action) => action.run());
    return due.length;
  }

  advance(): void {
    this.frame += 1;
  }

  get currentFrame(): number {
    return this.frame;
  }

  get size(): number {
    return this.pending.length;
  }
}

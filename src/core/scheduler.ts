export function parseScheduleTime(time: string): { hours: number; minutes: number } {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(time);
  if (!match) {
    throw new Error(`Invalid schedule time: ${time} (expected HH:MM)`);
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

/** Milliseconds from `now` to the next local `HH:MM`; a time equal to now counts as tomorrow. */
export function msUntilNextRun(now: Date, time: string): number {
  const { hours, minutes } = parseScheduleTime(time);
  const next = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hours, minutes, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next.getTime() - now.getTime();
}

export interface SchedulerCallbacks {
  onScheduled?: (nextRun: Date) => void;
  onSkipped?: () => void;
  onRunError?: (error: unknown) => void;
}

export class DailyScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private stopped = true;
  private now: () => Date;

  constructor(
    private time: string,
    private task: () => Promise<void>,
    private callbacks: SchedulerCallbacks = {},
    options: { now?: () => Date } = {}
  ) {
    parseScheduleTime(time);
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    this.stopped = false;
    this.scheduleNext();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Runs the task now unless a run is already in flight. A failure is reported, not thrown. */
  async tick(): Promise<void> {
    if (this.running) {
      this.callbacks.onSkipped?.();
      return;
    }
    this.running = true;
    try {
      await this.task();
    } catch (error) {
      this.callbacks.onRunError?.(error);
    } finally {
      this.running = false;
    }
  }

  private scheduleNext(): void {
    if (this.stopped) return;
    const now = this.now();
    const delay = msUntilNextRun(now, this.time);
    this.callbacks.onScheduled?.(new Date(now.getTime() + delay));
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick().then(() => this.scheduleNext());
    }, delay);
  }
}

/**
 * Handle returned by every scheduling call. Cancelling twice is harmless.
 */
export interface TimerHandle {
  cancel(): void;
}

/**
 * The scheduling capability the lifecycle scheduler needs from its host.
 * All durations are in seconds.
 */
export interface Clock {
  now(): number;
  after(seconds: number, callback: () => void): TimerHandle;
  every(seconds: number, callback: () => void): TimerHandle;
}

export function isClock(value: unknown): value is Clock {
  return (
    typeof value === 'object' &&
    value !== null &&
    'now' in value &&
    typeof value.now === 'function' &&
    'after' in value &&
    typeof value.after === 'function' &&
    'every' in value &&
    typeof value.every === 'function'
  );
}

// Node fires any delay above this after 1 ms
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/**
 * Wall-clock scheduling on top of Node's timers.
 * Delays longer than a single Node timer allows are split into chained timeouts.
 */
export class SystemClock implements Clock {
  public now(): number {
    return performance.now() / 1000;
  }

  public after(seconds: number, callback: () => void): TimerHandle {
    let remaining = Math.max(0, seconds * 1000);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const step = (): void => {
      if (remaining > MAX_TIMEOUT_MS) {
        remaining -= MAX_TIMEOUT_MS;
        timer = setTimeout(step, MAX_TIMEOUT_MS);
        return;
      }
      timer = setTimeout(callback, remaining);
    };
    step();

    return { cancel: () => clearTimeout(timer) };
  }

  public every(seconds: number, callback: () => void): TimerHandle {
    assertInterval(seconds);
    if (seconds * 1000 <= MAX_TIMEOUT_MS) {
      const timer = setInterval(callback, seconds * 1000);
      return { cancel: () => clearInterval(timer) };
    }

    let current: TimerHandle | undefined;
    const arm = (): void => {
      // Re-arm before the callback so it may cancel its own timer
      current = this.after(seconds, () => {
        arm();
        callback();
      });
    };
    arm();

    return { cancel: () => current?.cancel() };
  }
}

interface ManualTimer {
  id: number;
  dueAt: number;
  // ordering among timers due at the same moment
  seq: number;
  interval?: number;
  callback: () => void;
}

/**
 * A virtual timeline driven by the host, e.g. once per game-loop step.
 * Nothing fires until `advance` is called, which makes it the clock of choice for simulations and tests.
 */
export class ManualClock implements Clock {
  private time: number;
  private nextId = 0;
  private nextSeq = 0;
  private timers: Map<number, ManualTimer> = new Map();

  /**
   * @param start Initial value of `now()`, in seconds.
   */
  constructor(start: number = 0) {
    this.time = start;
  }

  public now(): number {
    return this.time;
  }

  public after(seconds: number, callback: () => void): TimerHandle {
    return this.schedule(Math.max(0, seconds), callback);
  }

  public every(seconds: number, callback: () => void): TimerHandle {
    assertInterval(seconds);
    return this.schedule(seconds, callback, seconds);
  }

  /**
   * Moves time forward, firing every callback that comes due on the way.
   * Callbacks run in due-time order (ties in scheduling order), with `now()` set to their due time.
   * Timers scheduled by a callback also fire if they fall inside the window.
   * @param seconds How far to advance. Must not be negative.
   */
  public advance(seconds: number): void {
    if (!(seconds >= 0)) {
      throw new RangeError(`[ManualClock] Cannot advance by ${seconds} seconds`);
    }
    const target = this.time + seconds;

    let timer = this.nextDue(target);
    while (timer) {
      this.time = timer.dueAt;
      if (timer.interval === undefined) {
        this.timers.delete(timer.id);
      } else {
        // Reschedule before firing so the callback may cancel its own timer
        timer.dueAt += timer.interval;
        timer.seq = this.nextSeq++;
      }
      timer.callback();
      timer = this.nextDue(target);
    }

    this.time = target;
  }

  /**
   * Number of timers that can still fire.
   */
  public pending(): number {
    return this.timers.size;
  }

  private schedule(delay: number, callback: () => void, interval?: number): TimerHandle {
    const id = this.nextId++;
    this.timers.set(id, {
      id,
      dueAt: this.time + delay,
      seq: this.nextSeq++,
      interval,
      callback,
    });
    return { cancel: () => { this.timers.delete(id); } };
  }

  private nextDue(target: number): ManualTimer | undefined {
    let next: ManualTimer | undefined;
    for (const timer of this.timers.values()) {
      if (timer.dueAt > target) continue;
      if (!next || timer.dueAt < next.dueAt || (timer.dueAt === next.dueAt && timer.seq < next.seq)) {
        next = timer;
      }
    }
    return next;
  }
}

function assertInterval(seconds: number): void {
  if (!(seconds > 0) || !Number.isFinite(seconds)) {
    throw new RangeError(`[Clock] Repeating interval must be a positive number of seconds, got ${seconds}`);
  }
}

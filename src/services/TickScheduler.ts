import { EventEmitter } from 'events';
import { Utils } from '../shared/utils';
import { config } from '../shared/config';
import { getLogger } from '../shared/logger';
import { toError } from '../shared/errorUtils';
import { NotFoundError } from '../shared/errors';
import { IntervalSchema, parseOrThrow } from '../shared/validation';
import { PeriodicScheduler, TimerHandle } from '../shared/interfaces';

export interface Timer {
  id: string;
  name: string;
  callback: () => void;
  interval: number;
  active: boolean;
  lastRun?: Date;
  nextRun: Date;
  runCount: number;
  errorCount: number;
  lastError?: Error | undefined;
}

export interface TickSchedulerOptions {
  /** Consecutive failures after which a timer is canceled; 0 never cancels. */
  maxConsecutiveErrors?: number;
}

export interface TickSchedulerStats {
  totalTimers: number;
  totalRuns: number;
  totalErrors: number;
}

/**
 * Runs callbacks at fixed intervals until their timers are canceled.
 *
 * Timers can be scheduled while the scheduler is stopped; they begin
 * ticking once it is started.
 */
export class TickScheduler extends EventEmitter implements PeriodicScheduler {
  private timers: Map<string, Timer> = new Map();
  private timeouts: Map<string, NodeJS.Timeout> = new Map();
  private isStarted = false;
  private options: Required<TickSchedulerOptions>;

  constructor(options: TickSchedulerOptions = {}) {
    super();
    this.options = {
      maxConsecutiveErrors: options.maxConsecutiveErrors ?? config.skills.maxConsecutiveTickErrors
    };
  }

  /**
   * Register a recurring callback and return its handle
   */
  schedule(callback: () => void, intervalMs: number, name = 'timer'): TimerHandle {
    const interval = parseOrThrow(IntervalSchema, intervalMs, { timer: name });
    const timer: Timer = {
      id: Utils.generateId(),
      name,
      callback,
      interval,
      active: true,
      runCount: 0,
      errorCount: 0,
      nextRun: new Date(Date.now() + interval)
    };

    this.timers.set(timer.id, timer);

    if (this.isStarted) {
      this.scheduleNext(timer);
    }

    this.emit('timerScheduled', timer);
    return this.createHandle(timer);
  }

  /**
   * Cancel a timer. Returns false if it is unknown or already canceled.
   */
  cancel(timerId: string, reason = 'Canceled'): boolean {
    const timer = this.timers.get(timerId);
    if (!timer || !timer.active) {
      return false;
    }

    timer.active = false;
    this.clearPendingTimeout(timerId);
    this.timers.delete(timerId);

    this.emit('timerCanceled', timer, reason);
    return true;
  }

  start(): void {
    if (this.isStarted) {
      return;
    }

    this.isStarted = true;

    for (const timer of this.timers.values()) {
      // Pending timers restart their interval from now
      timer.nextRun = new Date(Date.now() + timer.interval);
      this.scheduleNext(timer);
    }

    this.emit('started');
  }

  stop(): void {
    if (!this.isStarted) {
      return;
    }

    this.isStarted = false;

    for (const timeout of this.timeouts.values()) {
      clearTimeout(timeout);
    }
    this.timeouts.clear();

    this.emit('stopped');
  }

  get running(): boolean {
    return this.isStarted;
  }

  getTimer(timerId: string): Timer | undefined {
    return this.timers.get(timerId);
  }

  getAllTimers(): Timer[] {
    return Array.from(this.timers.values());
  }

  /**
   * Run a timer's callback right away. Errors are rethrown to the caller
   * after being recorded.
   */
  trigger(timerId: string): void {
    const timer = this.timers.get(timerId);
    if (!timer) {
      throw new NotFoundError('Timer', timerId);
    }

    const error = this.runTimer(timer);
    if (error) {
      throw error;
    }
  }

  getStats(): TickSchedulerStats {
    const timers = Array.from(this.timers.values());

    return {
      totalTimers: timers.length,
      totalRuns: timers.reduce((sum, timer) => sum + timer.runCount, 0),
      totalErrors: timers.reduce((sum, timer) => sum + timer.errorCount, 0)
    };
  }

  private createHandle(timer: Timer): TimerHandle {
    return {
      id: timer.id,
      get isActive(): boolean {
        return timer.active;
      },
      cancel: (): void => {
        this.cancel(timer.id);
      }
    };
  }

  private scheduleNext(timer: Timer): void {
    if (!timer.active) {
      return;
    }

    this.clearPendingTimeout(timer.id);

    const delay = Math.max(0, timer.nextRun.getTime() - Date.now());

    const timeout = setTimeout(() => {
      this.timeouts.delete(timer.id);
      this.runTimer(timer);

      if (timer.active && this.isStarted) {
        timer.nextRun = new Date(Date.now() + timer.interval);
        this.scheduleNext(timer);
      }
    }, delay);

    this.timeouts.set(timer.id, timeout);
  }

  /**
   * Run the callback once, returning the error it threw, if any
   */
  private runTimer(timer: Timer): Error | undefined {
    timer.lastRun = new Date();

    try {
      timer.callback();
      timer.runCount++;
      timer.errorCount = 0;
      timer.lastError = undefined;

      this.emit('tickCompleted', timer);
      return undefined;
    } catch (thrown) {
      const error = toError(thrown);
      timer.errorCount++;
      timer.lastError = error;

      getLogger().error(`Timer '${timer.name}' failed`, error, {
        timerId: timer.id,
        errorCount: timer.errorCount
      });
      this.emit('tickError', timer, error);

      const limit = this.options.maxConsecutiveErrors;
      if (limit > 0 && timer.errorCount >= limit) {
        this.cancel(timer.id, 'Max consecutive errors exceeded');
      }

      return error;
    }
  }

  private clearPendingTimeout(timerId: string): void {
    const timeout = this.timeouts.get(timerId);
    if (timeout) {
      clearTimeout(timeout);
      this.timeouts.delete(timerId);
    }
  }
}

let globalTickScheduler: TickScheduler | undefined;

/**
 * Process-wide scheduler used by timed skills unless another one is given
 */
export const getTickScheduler = (): TickScheduler => {
  if (!globalTickScheduler) {
    globalTickScheduler = new TickScheduler();
  }
  return globalTickScheduler;
};

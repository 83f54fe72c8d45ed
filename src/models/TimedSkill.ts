import { Skill } from './Skill';
import { config } from '../shared/config';
import { NotImplementedError } from '../shared/errors';
import { PeriodicScheduler, TimerHandle } from '../shared/interfaces';
import { IntervalSchema, parseOrThrow } from '../shared/validation';
import { getTickScheduler } from '../services/TickScheduler';

/**
 * Base class for skills that act at a fixed interval.
 *
 * The timer is registered on construction and bound to {@link tick},
 * which subclasses override. {@link destroy} cancels it.
 */
export class TimedSkill extends Skill {
  /** Milliseconds between ticks. */
  static readonly tickInterval: number = config.skills.tickIntervalMs;

  public readonly timer: TimerHandle;

  constructor(level = 0, scheduler: PeriodicScheduler = getTickScheduler()) {
    super(level);
    const interval = parseOrThrow(IntervalSchema, new.target.tickInterval, { classId: this.classId });
    this.timer = scheduler.schedule(() => this.tick(), interval, this.classId);
  }

  protected tick(): void {
    throw new NotImplementedError('tick', `TimedSkill class '${this.classId}'`);
  }

  destroy(): void {
    this.timer.cancel();
  }
}

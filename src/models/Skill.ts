import { CallbackTable, TaggedCallback } from './EventCallback';
import { CallbackRegistry, EMPTY_REGISTRY, buildCallbackRegistry } from './CallbackRegistry';
import { EventData } from '../shared/types';
import { SKILL_CONSTANTS } from '../shared/constants';
import { LevelSchema, MaxLevelSchema, parseOrThrow } from '../shared/validation';
import { Utils } from '../shared/utils';

/**
 * Class-level identity of a skill, readable without creating an instance.
 */
export interface SkillClassDescriptor {
  readonly classId: string;
  readonly displayName: string;
  readonly description: string;
  /** `null` when the skill can be leveled without limit. */
  readonly maxLevel: number | null;
  readonly eventCallbacks: ReadonlyMap<string, readonly TaggedCallback[]>;
  /** Attribute name each callback is declared under. */
  readonly callbackNames: ReadonlyMap<TaggedCallback, string>;
}

export type SkillClass = typeof Skill;

interface ResolvedSkillClass {
  descriptor: SkillClassDescriptor;
  registry: CallbackRegistry;
}

const resolvedClasses = new WeakMap<SkillClass, ResolvedSkillClass>();
const NO_CALLBACKS: CallbackTable = Object.freeze({});

/**
 * Skills are leveled abilities that react to named game events.
 *
 * A skill is defined by subclassing and setting the class attributes:
 *
 * - `doc`: documentation text, used as the description by default
 * - `maxLevel`: level ceiling, `null` for none (inherited by subclasses)
 * - `callbacks`: event callbacks declared with {@link eventCallback}
 * - `classId`, `skillName`, `description`: explicit overrides of the
 *   identity otherwise derived from the class name and `doc`
 *
 * Identity overrides, `doc` and `callbacks` only count on the class that
 * declares them; callbacks of base classes are merged in by the registry.
 */
export class Skill {
  static readonly classId?: string;
  static readonly skillName?: string;
  static readonly description?: string;
  static readonly doc?: string;
  static readonly maxLevel: number | null = null;
  static readonly callbacks: CallbackTable = {};

  /**
   * Descriptor of the class this is called on
   */
  static describe(this: SkillClass): SkillClassDescriptor {
    return describeSkill(this);
  }

  public readonly descriptor: SkillClassDescriptor;
  private currentLevel = 0;

  constructor(level = 0) {
    this.descriptor = describeSkill(new.target);
    this.level = level;
  }

  get classId(): string {
    return this.descriptor.classId;
  }

  get level(): number {
    return this.currentLevel;
  }

  /**
   * Rejects negative and fractional levels. The ceiling is left to the
   * code that levels the skill up.
   */
  set level(value: number) {
    this.currentLevel = parseOrThrow(LevelSchema, value, { classId: this.descriptor.classId });
  }

  get maxLevel(): number | null {
    return this.descriptor.maxLevel;
  }

  get isMaxLevel(): boolean {
    return this.descriptor.maxLevel !== null && this.currentLevel >= this.descriptor.maxLevel;
  }

  get upgradeCost(): number {
    return (this.currentLevel + 1) * SKILL_CONSTANTS.UPGRADE_COST_PER_LEVEL;
  }

  get downgradeRefund(): number {
    return this.currentLevel * SKILL_CONSTANTS.DOWNGRADE_REFUND_PER_LEVEL;
  }

  callbacksFor(eventName: string): readonly TaggedCallback[] {
    return this.descriptor.eventCallbacks.get(eventName) ?? [];
  }

  /**
   * Run every callback registered for the event, in order.
   *
   * Events without callbacks are ignored. An error thrown by a callback
   * propagates as is and the remaining callbacks do not run.
   */
  dispatch(eventName: string, eventData: EventData = {}): void {
    const callbacks = this.descriptor.eventCallbacks.get(eventName);
    if (!callbacks) {
      return;
    }
    for (const callback of callbacks) {
      callback.invoke(this, eventData);
    }
  }

  /**
   * Release resources held by the skill. Plain skills hold none.
   */
  destroy(): void {
    return;
  }
}

export function isSkillClass(value: unknown): value is SkillClass {
  return value === Skill || (typeof value === 'function' && value.prototype instanceof Skill);
}

function resolveSkillClass(cls: SkillClass): ResolvedSkillClass {
  const cached = resolvedClasses.get(cls);
  if (cached) {
    return cached;
  }

  const parent: unknown = Object.getPrototypeOf(cls);
  const baseRegistry = cls !== Skill && isSkillClass(parent)
    ? resolveSkillClass(parent).registry
    : EMPTY_REGISTRY;

  const registry = buildCallbackRegistry(baseRegistry, Utils.ownValue(cls, 'callbacks') ?? NO_CALLBACKS, cls.name);
  const maxLevel = parseOrThrow(MaxLevelSchema, cls.maxLevel, { skillClass: cls.name });

  const descriptor: SkillClassDescriptor = Object.freeze({
    classId: Utils.ownValue(cls, 'classId') ?? cls.name,
    displayName: Utils.ownValue(cls, 'skillName') ?? Utils.humanize(cls.name),
    description: Utils.ownValue(cls, 'description') ?? Utils.ownValue(cls, 'doc') ?? '',
    maxLevel,
    eventCallbacks: registry.byEvent,
    callbackNames: registry.names
  });

  const resolved = { descriptor, registry };
  resolvedClasses.set(cls, resolved);
  return resolved;
}

/**
 * Build (once) and return the descriptor of a skill class.
 */
export function describeSkill(cls: SkillClass): SkillClassDescriptor {
  return resolveSkillClass(cls).descriptor;
}

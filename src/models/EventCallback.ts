import type { Skill } from './Skill';
import type { EventData } from '../shared/types';
import { CallbackDeclarationError } from '../shared/errors';
import { EventNamesSchema } from '../shared/validation';

/**
 * A callback tagged with the names of the events it runs for.
 *
 * `invoke` is declared with method syntax so a callback written for a
 * specific skill subclass or payload shape can sit in a table of callbacks
 * typed for the base `Skill` and `EventData`.
 */
export interface TaggedCallback<S extends Skill = Skill, D extends EventData = EventData> {
  readonly events: readonly string[];
  invoke(skill: S, data: D): void;
}

/**
 * Callbacks declared directly on a skill class, keyed by attribute name.
 * A subclass entry with the same key replaces the inherited callback.
 */
export type CallbackTable = Readonly<Record<string, TaggedCallback>>;

/**
 * Tag a callback with the events it should run for.
 *
 * Nothing is registered here; the skill class's registry picks the
 * callback up the first time the class is described.
 *
 * @example
 * ```ts
 * class Bonus_Health extends Skill {
 *   static readonly doc = 'Grant +25 bonus health for each level upon spawning.';
 *   static readonly maxLevel = 16;
 *   static readonly callbacks: CallbackTable = {
 *     giveHealth: eventCallback(['player_spawn'], (skill, { player }: { player: GameEntity }) => {
 *       player.health += skill.level * 25;
 *     })
 *   };
 * }
 * ```
 */
export function eventCallback<S extends Skill = Skill, D extends EventData = EventData>(
  eventNames: readonly string[],
  callback: (skill: S, data: D) => void
): TaggedCallback<S, D> {
  const parsed = EventNamesSchema.safeParse(eventNames);
  if (!parsed.success) {
    throw new CallbackDeclarationError(
      'Event callbacks must be declared with at least one non-empty event name',
      parsed.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }

  const events = Object.freeze(Array.from(new Set(parsed.data)));

  return Object.freeze({
    events,
    invoke(skill: S, data: D): void {
      callback(skill, data);
    }
  });
}

export function isTaggedCallback(value: unknown): value is TaggedCallback {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const events: unknown = Reflect.get(value, 'events');
  const invoke: unknown = Reflect.get(value, 'invoke');
  return Array.isArray(events)
    && events.length > 0
    && events.every(event => typeof event === 'string')
    && typeof invoke === 'function';
}

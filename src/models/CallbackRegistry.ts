import { CallbackTable, TaggedCallback, isTaggedCallback } from './EventCallback';
import { CallbackDeclarationError } from '../shared/errors';

/**
 * Resolved callbacks of one skill class, inherited ones included.
 */
export interface CallbackRegistry {
  /** Event name to callbacks, in the order they run. */
  readonly byEvent: ReadonlyMap<string, readonly TaggedCallback[]>;
  /** Attribute name to callback, used to resolve overrides in subclasses. */
  readonly byName: ReadonlyMap<string, TaggedCallback>;
  /** Callback to the attribute name it is registered under. */
  readonly names: ReadonlyMap<TaggedCallback, string>;
}

export const EMPTY_REGISTRY: CallbackRegistry = {
  byEvent: new Map(),
  byName: new Map(),
  names: new Map()
};

const removeOnce = (list: TaggedCallback[], callback: TaggedCallback): void => {
  const index = list.indexOf(callback);
  if (index !== -1) {
    list.splice(index, 1);
  }
};

/**
 * Build a class's registry from its base class's registry and the callbacks
 * the class declares itself.
 *
 * The base registry is copied, never mutated or shared. A declared callback
 * whose attribute name is already taken by an inherited one replaces it in
 * every event list the inherited one was in; the replacement runs after the
 * remaining base callbacks.
 */
export function buildCallbackRegistry(
  base: CallbackRegistry,
  declared: CallbackTable,
  owner = 'skill class'
): CallbackRegistry {
  const byEvent = new Map<string, TaggedCallback[]>();
  for (const [eventName, callbacks] of base.byEvent) {
    byEvent.set(eventName, [...callbacks]);
  }
  const byName = new Map(base.byName);

  for (const [name, callback] of Object.entries(declared)) {
    if (!isTaggedCallback(callback)) {
      throw new CallbackDeclarationError(`Callback '${name}' of ${owner} is not declared with eventCallback()`);
    }

    const replaced = byName.get(name);
    if (replaced) {
      for (const eventName of replaced.events) {
        const list = byEvent.get(eventName);
        if (!list) continue;
        removeOnce(list, replaced);
      }
      byName.delete(name);
    }

    byName.set(name, callback);
    for (const eventName of callback.events) {
      const list = byEvent.get(eventName);
      if (list) {
        list.push(callback);
      } else {
        byEvent.set(eventName, [callback]);
      }
    }
  }

  // Lists emptied by an override keep their slot until here
  const frozen = new Map<string, readonly TaggedCallback[]>();
  for (const [eventName, callbacks] of byEvent) {
    if (callbacks.length > 0) {
      frozen.set(eventName, Object.freeze(callbacks));
    }
  }

  const names = new Map<TaggedCallback, string>();
  for (const [name, callback] of byName) {
    names.set(callback, name);
  }

  return Object.freeze({ byEvent: frozen, byName, names });
}

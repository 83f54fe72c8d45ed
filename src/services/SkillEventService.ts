import { Player } from '../models/Player';
import { config } from '../shared/config';
import { getLogger } from '../shared/logger';
import { EventData } from '../shared/types';
import { SkillCallbackError } from '../shared/errors';
import { withCallbackErrorHandling } from '../shared/errorUtils';

export interface SkillEventServiceOptions {
  /** Run every callback on its own, logging failures instead of throwing. */
  isolateCallbacks?: boolean;
}

export interface EventDispatchResult {
  eventName: string;
  skillsNotified: number;
  callbacksRun: number;
  failures: SkillCallbackError[];
}

/**
 * Routes host game events to the active skills of a player.
 */
export class SkillEventService {
  private readonly isolateCallbacks: boolean;

  constructor(options: SkillEventServiceOptions = {}) {
    this.isolateCallbacks = options.isolateCallbacks ?? config.skills.isolateCallbacks;
  }

  /**
   * Fire an event for one player. The payload gets the player under
   * `player` unless the caller already set that key.
   */
  fireEvent(player: Player, eventName: string, data: EventData = {}): EventDispatchResult {
    const payload: EventData = { player, ...data };
    const result: EventDispatchResult = {
      eventName,
      skillsNotified: 0,
      callbacksRun: 0,
      failures: []
    };

    for (const skill of player.activeSkills) {
      const callbacks = skill.callbacksFor(eventName);
      if (callbacks.length === 0) {
        continue;
      }
      result.skillsNotified++;

      if (!this.isolateCallbacks) {
        skill.dispatch(eventName, payload);
        result.callbacksRun += callbacks.length;
        continue;
      }

      callbacks.forEach((callback, index) => {
        const failure = withCallbackErrorHandling(() => callback.invoke(skill, payload), {
          eventName,
          classId: skill.classId,
          callbackName: skill.descriptor.callbackNames.get(callback) ?? `#${index}`
        });
        result.callbacksRun++;
        if (failure) {
          result.failures.push(failure);
        }
      });
    }

    if (result.failures.length > 0) {
      getLogger().warn(`Event '${eventName}' finished with failing callbacks`, {
        playerId: player.id,
        failures: result.failures.length
      });
    }

    return result;
  }

  /**
   * Fire the same event for several players, building each payload separately
   */
  fireEventForAll(
    players: Iterable<Player>,
    eventName: string,
    dataFor: (player: Player) => EventData = () => ({})
  ): EventDispatchResult[] {
    const results: EventDispatchResult[] = [];
    for (const player of players) {
      results.push(this.fireEvent(player, eventName, dataFor(player)));
    }
    return results;
  }
}

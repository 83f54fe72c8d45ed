import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SkillEventService } from '../../services/SkillEventService';
import { Player } from '../../models/Player';
import { Skill } from '../../models/Skill';
import { CallbackTable, eventCallback } from '../../models/EventCallback';
import { SkillCallbackError } from '../../shared/errors';
import { EventData } from '../../shared/types';
import { getLogger } from '../../shared/logger';
import { TestEntity } from '../helpers/TestEntity';

const received: Array<{ skill: string; data: EventData }> = [];

class Listener extends Skill {
  static readonly callbacks: CallbackTable = {
    record: eventCallback(['player_jump'], (skill: Skill, data: EventData) => {
      received.push({ skill: skill.classId, data });
    })
  };
}

class Broken extends Skill {
  static readonly callbacks: CallbackTable = {
    fail: eventCallback(['player_jump'], () => {
      throw new Error('boom');
    }),
    after: eventCallback(['player_jump'], (skill: Skill) => {
      received.push({ skill: `${skill.classId}.after`, data: {} });
    })
  };
}

describe('SkillEventService', () => {
  let player: Player;

  beforeEach(() => {
    received.length = 0;
    player = new Player(new TestEntity(), { id: 'player-1' });
  });

  describe('default mode', () => {
    const service = new SkillEventService({ isolateCallbacks: false });

    it('should forward the payload with the player to active skills', () => {
      player.addSkill(new Listener(1));

      const result = service.fireEvent(player, 'player_jump', { height: 3 });

      expect(received).toEqual([{ skill: 'Listener', data: { player, height: 3 } }]);
      expect(result).toEqual({
        eventName: 'player_jump',
        skillsNotified: 1,
        callbacksRun: 1,
        failures: []
      });
    });

    it('should skip skills at level 0', () => {
      player.addSkill(new Listener(0));

      const result = service.fireEvent(player, 'player_jump');

      expect(received).toEqual([]);
      expect(result.skillsNotified).toBe(0);
    });

    it('should ignore events no skill listens to', () => {
      player.addSkill(new Listener(1));

      const result = service.fireEvent(player, 'player_death');

      expect(received).toEqual([]);
      expect(result.callbacksRun).toBe(0);
    });

    it('should let callback errors propagate', () => {
      player.addSkill(new Broken(1));

      expect(() => service.fireEvent(player, 'player_jump')).toThrow('boom');
      expect(received).toEqual([]);
    });
  });

  describe('isolated mode', () => {
    const service = new SkillEventService({ isolateCallbacks: true });

    it('should keep running callbacks after one fails', () => {
      player.addSkill(new Broken(1));
      player.addSkill(new Listener(1));

      const result = service.fireEvent(player, 'player_jump');

      expect(received.map(entry => entry.skill)).toEqual(['Broken.after', 'Listener']);
      expect(result.skillsNotified).toBe(2);
      expect(result.callbacksRun).toBe(3);
      expect(result.failures).toHaveLength(1);

      const failure = result.failures[0];
      expect(failure).toBeInstanceOf(SkillCallbackError);
      expect(failure?.classId).toBe('Broken');
      expect(failure?.originalError.message).toBe('boom');
      expect(failure?.message).toBe("Callback of skill 'Broken' failed on 'player_jump': boom");
    });
  });

  it('should log failures under the callback attribute name', () => {
    const service = new SkillEventService({ isolateCallbacks: true });
    const errorSpy = vi.spyOn(getLogger(), 'logAppError');
    player.addSkill(new Broken(1));

    service.fireEvent(player, 'player_jump');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[1]).toEqual({ callbackName: 'fail', cause: undefined });
  });

  it('should fire for several players with their own payloads', () => {
    const service = new SkillEventService({ isolateCallbacks: false });
    const other = new Player(new TestEntity(), { id: 'player-2' });
    player.addSkill(new Listener(1));
    other.addSkill(new Listener(1));

    const results = service.fireEventForAll([player, other], 'player_jump', target => ({ id: target.id }));

    expect(results).toHaveLength(2);
    expect(received.map(entry => entry.data.id)).toEqual(['player-1', 'player-2']);
  });
});

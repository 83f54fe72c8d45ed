import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Health, Regeneration, Vampirism } from '../../skills';
import { Player } from '../../models/Player';
import { SkillEventService } from '../../services/SkillEventService';
import { TickScheduler } from '../../services/TickScheduler';
import { GAME_EVENTS } from '../../shared/constants';
import { TestEntity } from '../helpers/TestEntity';

describe('Built-in skills', () => {
  const events = new SkillEventService({ isolateCallbacks: false });
  let entity: TestEntity;
  let player: Player;

  beforeEach(() => {
    entity = new TestEntity(100, 100);
    player = new Player(entity, { id: 'player-1' });
  });

  describe('Health', () => {
    it('should describe itself from its doc', () => {
      expect(Health.describe()).toMatchObject({
        classId: 'Health',
        displayName: 'Health',
        description: 'Grant +25 maximum health for each level upon spawning.',
        maxLevel: 16
      });
    });

    it('should add 25 health per level on spawn', () => {
      player.addSkill(new Health(2));

      events.fireEvent(player, GAME_EVENTS.PLAYER_SPAWN);

      expect(entity.maxHealth).toBe(150);
      expect(entity.health).toBe(150);
    });
  });

  describe('Vampirism', () => {
    it('should heal a share of the damage dealt, rounded up', () => {
      entity.health = 50;
      player.addSkill(new Vampirism(2));

      events.fireEvent(player, GAME_EVENTS.PLAYER_ATTACK, { damage: 30 });

      expect(entity.health).toBe(53);
    });

    it('should not heal past maximum health', () => {
      entity.health = 99;
      player.addSkill(new Vampirism(6));

      events.fireEvent(player, GAME_EVENTS.PLAYER_ATTACK, { damage: 100 });

      expect(entity.health).toBe(100);
    });

    it('should do nothing for a dead attacker or no damage', () => {
      player.addSkill(new Vampirism(3));
      entity.health = 40;
      events.fireEvent(player, GAME_EVENTS.PLAYER_ATTACK, { damage: 0 });
      expect(entity.health).toBe(40);

      entity.health = 0;
      events.fireEvent(player, GAME_EVENTS.PLAYER_ATTACK, { damage: 50 });
      expect(entity.health).toBe(0);
    });
  });

  describe('Regeneration', () => {
    let scheduler: TickScheduler;

    beforeEach(() => {
      vi.useFakeTimers();
      scheduler = new TickScheduler({ maxConsecutiveErrors: 0 });
      scheduler.start();
    });

    afterEach(() => {
      scheduler.stop();
      vi.useRealTimers();
    });

    it('should heal every second once the player has spawned', () => {
      const regeneration = new Regeneration(3, scheduler);
      player.addSkill(regeneration);
      entity.health = 90;

      vi.advanceTimersByTime(1000);
      expect(entity.health).toBe(90);

      events.fireEvent(player, GAME_EVENTS.PLAYER_SPAWN);
      vi.advanceTimersByTime(2000);
      expect(entity.health).toBe(96);

      vi.advanceTimersByTime(2000);
      expect(entity.health).toBe(100);
    });

    it('should stop healing after death', () => {
      player.addSkill(new Regeneration(1, scheduler));
      events.fireEvent(player, GAME_EVENTS.PLAYER_SPAWN);
      entity.health = 50;

      events.fireEvent(player, GAME_EVENTS.PLAYER_DEATH);
      vi.advanceTimersByTime(3000);

      expect(entity.health).toBe(50);
    });

    it('should release its timer when removed', () => {
      player.addSkill(new Regeneration(1, scheduler));
      expect(scheduler.getStats().totalTimers).toBe(1);

      player.removeSkill('Regeneration');

      expect(scheduler.getStats().totalTimers).toBe(0);
    });
  });
});

import { Skill } from '../models/Skill';
import { Player } from '../models/Player';
import { CallbackTable, eventCallback } from '../models/EventCallback';
import { GAME_EVENTS, SKILL_CONSTANTS } from '../shared/constants';

type AttackData = { player: Player; damage: number };

export class Vampirism extends Skill {
  static readonly doc = 'Heal 5% of the damage dealt for each level, up to maximum health.';
  static readonly maxLevel = SKILL_CONSTANTS.VAMPIRISM_MAX_LEVEL;

  static readonly callbacks: CallbackTable = {
    drainHealth: eventCallback([GAME_EVENTS.PLAYER_ATTACK], (skill: Skill, { player, damage }: AttackData) => {
      const entity = player.entity;
      if (entity.isDead || damage <= 0) {
        return;
      }
      const heal = Math.ceil((damage * skill.level * SKILL_CONSTANTS.VAMPIRISM_LIFESTEAL_PERCENT_PER_LEVEL) / 100);
      entity.health = Math.max(entity.health, Math.min(entity.maxHealth, entity.health + heal));
    })
  };
}

import { Skill } from '../models/Skill';
import { Player } from '../models/Player';
import { CallbackTable, eventCallback } from '../models/EventCallback';
import { GAME_EVENTS, SKILL_CONSTANTS } from '../shared/constants';

type SpawnData = { player: Player };

export class Health extends Skill {
  static readonly doc = 'Grant +25 maximum health for each level upon spawning.';
  static readonly maxLevel = SKILL_CONSTANTS.HEALTH_MAX_LEVEL;

  static readonly callbacks: CallbackTable = {
    giveHealth: eventCallback([GAME_EVENTS.PLAYER_SPAWN], (skill: Skill, { player }: SpawnData) => {
      const bonus = skill.level * SKILL_CONSTANTS.HEALTH_BONUS_PER_LEVEL;
      player.entity.maxHealth += bonus;
      player.entity.health += bonus;
    })
  };
}

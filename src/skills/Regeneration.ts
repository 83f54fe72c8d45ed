import { TimedSkill } from '../models/TimedSkill';
import { Player } from '../models/Player';
import { CallbackTable, eventCallback } from '../models/EventCallback';
import { GameEntity } from '../shared/interfaces';
import { GAME_EVENTS, SKILL_CONSTANTS } from '../shared/constants';

type PlayerData = { player: Player };

export class Regeneration extends TimedSkill {
  static readonly doc = 'Regenerate 1 health for each level every second, up to maximum health.';
  static readonly maxLevel = SKILL_CONSTANTS.REGENERATION_MAX_LEVEL;
  static readonly tickInterval = SKILL_CONSTANTS.REGENERATION_INTERVAL;

  static readonly callbacks: CallbackTable = {
    track: eventCallback([GAME_EVENTS.PLAYER_SPAWN], (skill: Regeneration, { player }: PlayerData) => {
      skill.target = player.entity;
    }),
    forget: eventCallback([GAME_EVENTS.PLAYER_DEATH], (skill: Regeneration) => {
      skill.target = undefined;
    })
  };

  private target: GameEntity | undefined;

  protected tick(): void {
    const target = this.target;
    if (!target || target.isDead || this.level === 0) {
      return;
    }
    const heal = this.level * SKILL_CONSTANTS.REGENERATION_HEAL_PER_LEVEL;
    target.health = Math.max(target.health, Math.min(target.maxHealth, target.health + heal));
  }
}

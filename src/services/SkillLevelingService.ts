import { Player } from '../models/Player';
import { Skill } from '../models/Skill';
import { getLogger } from '../shared/logger';
import { InsufficientResourcesError, InvalidGameStateError, NotFoundError } from '../shared/errors';

export interface LevelChangeResult {
  classId: string;
  previousLevel: number;
  newLevel: number;
  /** Credits gained (refund) or lost (cost) by the change. */
  creditsDelta: number;
  credits: number;
}

/**
 * Spends and refunds credits to move skills up and down their levels.
 */
export class SkillLevelingService {
  canUpgrade(player: Player, skill: Skill): boolean {
    return !skill.isMaxLevel && player.credits >= skill.upgradeCost;
  }

  canDowngrade(skill: Skill): boolean {
    return skill.level > 0;
  }

  upgradeSkill(player: Player, classId: string): LevelChangeResult {
    const skill = this.requireSkill(player, classId);

    if (skill.isMaxLevel) {
      throw new InvalidGameStateError(
        `Skill '${classId}' is already at its maximum level`,
        `level ${skill.level}`,
        `level below ${skill.maxLevel}`
      );
    }

    const cost = skill.upgradeCost;
    if (player.credits < cost) {
      throw new InsufficientResourcesError('credits', cost, player.credits);
    }

    const previousLevel = skill.level;
    player.credits -= cost;
    skill.level = previousLevel + 1;

    return this.record(player, skill, previousLevel, -cost);
  }

  downgradeSkill(player: Player, classId: string): LevelChangeResult {
    const skill = this.requireSkill(player, classId);

    if (!this.canDowngrade(skill)) {
      throw new InvalidGameStateError(`Skill '${classId}' is already at level 0`, 'level 0', 'level above 0');
    }

    const refund = skill.downgradeRefund;
    const previousLevel = skill.level;
    skill.level = previousLevel - 1;
    player.credits += refund;

    return this.record(player, skill, previousLevel, refund);
  }

  /**
   * Downgrade a skill to level 0, returning the total refund
   */
  resetSkill(player: Player, classId: string): number {
    const skill = this.requireSkill(player, classId);
    let refunded = 0;
    while (this.canDowngrade(skill)) {
      refunded += this.downgradeSkill(player, classId).creditsDelta;
    }
    return refunded;
  }

  resetSkills(player: Player): number {
    return player.skills.reduce((total, skill) => total + this.resetSkill(player, skill.classId), 0);
  }

  private requireSkill(player: Player, classId: string): Skill {
    const skill = player.getSkill(classId);
    if (!skill) {
      throw new NotFoundError('Skill', classId, { playerId: player.id });
    }
    return skill;
  }

  private record(player: Player, skill: Skill, previousLevel: number, creditsDelta: number): LevelChangeResult {
    const result: LevelChangeResult = {
      classId: skill.classId,
      previousLevel,
      newLevel: skill.level,
      creditsDelta,
      credits: player.credits
    };

    getLogger().info(`Skill '${skill.classId}' changed level ${previousLevel} -> ${skill.level}`, {
      playerId: player.id,
      creditsDelta,
      credits: player.credits
    });

    return result;
  }
}

import { Skill } from './Skill';
import { GameEntity } from '../shared/interfaces';
import { Utils } from '../shared/utils';
import { config } from '../shared/config';
import { ValidationFailureError } from '../shared/errors';
import { CreditsSchema, parseOrThrow } from '../shared/validation';

export interface PlayerOptions {
  id?: string;
  credits?: number;
}

/**
 * RPG state of a player: the credits spent on skills and the skills owned,
 * at most one per skill class.
 */
export class Player {
  public readonly id: string;
  public readonly entity: GameEntity;
  private balance = 0;
  private skillsById: Map<string, Skill> = new Map();

  constructor(entity: GameEntity, options: PlayerOptions = {}) {
    this.id = options.id ?? Utils.generateId();
    this.entity = entity;
    this.credits = options.credits ?? config.economy.startingCredits;
  }

  get credits(): number {
    return this.balance;
  }

  set credits(value: number) {
    this.balance = parseOrThrow(CreditsSchema, value, { playerId: this.id });
  }

  get skills(): Skill[] {
    return Array.from(this.skillsById.values());
  }

  /**
   * Skills with at least one level; only these react to events
   */
  get activeSkills(): Skill[] {
    return this.skills.filter(skill => skill.level > 0);
  }

  addSkill(skill: Skill): void {
    if (this.skillsById.has(skill.classId)) {
      throw new ValidationFailureError(`Player already has skill '${skill.classId}'`, [
        { field: 'classId', message: 'Duplicate skill' }
      ], { playerId: this.id });
    }
    this.skillsById.set(skill.classId, skill);
  }

  getSkill(classId: string): Skill | undefined {
    return this.skillsById.get(classId);
  }

  hasSkill(classId: string): boolean {
    return this.skillsById.has(classId);
  }

  /**
   * Remove a skill and release what it holds
   */
  removeSkill(classId: string): boolean {
    const skill = this.skillsById.get(classId);
    if (!skill) {
      return false;
    }
    skill.destroy();
    this.skillsById.delete(classId);
    return true;
  }

  destroy(): void {
    for (const skill of this.skillsById.values()) {
      skill.destroy();
    }
    this.skillsById.clear();
  }
}

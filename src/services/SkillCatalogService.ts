import { Skill, SkillClass, SkillClassDescriptor, describeSkill } from '../models/Skill';
import { getLogger } from '../shared/logger';
import { NotFoundError, ValidationFailureError } from '../shared/errors';

/**
 * Skill classes available to shops and menus, looked up by class ID.
 */
export class SkillCatalog {
  private classes: Map<string, SkillClass> = new Map();

  /**
   * Add a skill class. Its descriptor and callback registry are built here,
   * before any instance exists.
   */
  register(cls: SkillClass): SkillClassDescriptor {
    const descriptor = describeSkill(cls);
    const existing = this.classes.get(descriptor.classId);

    if (existing && existing !== cls) {
      throw new ValidationFailureError(`Skill class ID '${descriptor.classId}' is already registered`, [
        { field: 'classId', message: 'Duplicate class ID' }
      ]);
    }

    if (!existing) {
      this.classes.set(descriptor.classId, cls);
      getLogger().debug(`Registered skill '${descriptor.classId}'`, {
        events: Array.from(descriptor.eventCallbacks.keys())
      });
    }

    return descriptor;
  }

  registerAll(classes: Iterable<SkillClass>): SkillClassDescriptor[] {
    return Array.from(classes, cls => this.register(cls));
  }

  has(classId: string): boolean {
    return this.classes.has(classId);
  }

  get(classId: string): SkillClassDescriptor | undefined {
    const cls = this.classes.get(classId);
    return cls ? describeSkill(cls) : undefined;
  }

  getClass(classId: string): SkillClass | undefined {
    return this.classes.get(classId);
  }

  /**
   * Descriptors in registration order
   */
  list(): SkillClassDescriptor[] {
    return Array.from(this.classes.values(), cls => describeSkill(cls));
  }

  create(classId: string, level = 0): Skill {
    const cls = this.classes.get(classId);
    if (!cls) {
      throw new NotFoundError('Skill class', classId);
    }
    return new cls(level);
  }
}

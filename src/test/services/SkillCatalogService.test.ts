import { describe, it, expect, beforeEach } from 'vitest';
import { SkillCatalog } from '../../services/SkillCatalogService';
import { Skill } from '../../models/Skill';
import { CallbackTable, eventCallback } from '../../models/EventCallback';
import { CallbackDeclarationError, NotFoundError, ValidationFailureError } from '../../shared/errors';
import { createDefaultSkillCatalog } from '../../skills';

class Sprint extends Skill {
  static readonly doc = 'Run faster.';
  static readonly maxLevel = 3;
  static readonly callbacks: CallbackTable = {
    boost: eventCallback(['player_spawn'], () => undefined)
  };
}

class Impostor extends Skill {
  static readonly classId = 'Sprint';
}

describe('SkillCatalog', () => {
  let catalog: SkillCatalog;

  beforeEach(() => {
    catalog = new SkillCatalog();
  });

  it('should register a class and describe it', () => {
    const descriptor = catalog.register(Sprint);

    expect(descriptor.classId).toBe('Sprint');
    expect(descriptor.description).toBe('Run faster.');
    expect(descriptor.maxLevel).toBe(3);
    expect(Array.from(descriptor.eventCallbacks.keys())).toEqual(['player_spawn']);
    expect(catalog.has('Sprint')).toBe(true);
    expect(catalog.getClass('Sprint')).toBe(Sprint);
    expect(catalog.get('Sprint')).toBe(descriptor);
  });

  it('should accept the same class twice', () => {
    catalog.register(Sprint);

    expect(() => catalog.register(Sprint)).not.toThrow();
    expect(catalog.list()).toHaveLength(1);
  });

  it('should reject another class with a taken class id', () => {
    catalog.register(Sprint);

    expect(() => catalog.register(Impostor)).toThrow(ValidationFailureError);
    expect(catalog.getClass('Sprint')).toBe(Sprint);
  });

  it('should surface invalid callback tables at registration', () => {
    class Untagged extends Skill {
      static readonly callbacks: CallbackTable = {
        loose: { events: [], invoke: () => undefined }
      };
    }

    expect(() => catalog.register(Untagged)).toThrow(CallbackDeclarationError);
    expect(catalog.has('Untagged')).toBe(false);
  });

  it('should create instances at the requested level', () => {
    catalog.register(Sprint);

    const skill = catalog.create('Sprint', 2);

    expect(skill).toBeInstanceOf(Sprint);
    expect(skill.level).toBe(2);
  });

  it('should throw when creating an unknown class', () => {
    expect(() => catalog.create('Nope')).toThrow("Skill class with identifier 'Nope' not found");
    expect(() => catalog.create('Nope')).toThrow(NotFoundError);
  });

  it('should list the built-in skills in order', () => {
    const defaults = createDefaultSkillCatalog();

    expect(defaults.list().map(descriptor => descriptor.classId)).toEqual(['Health', 'Regeneration', 'Vampirism']);
  });
});

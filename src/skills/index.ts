import { SkillClass } from '../models/Skill';
import { SkillCatalog } from '../services/SkillCatalogService';
import { Health } from './Health';
import { Regeneration } from './Regeneration';
import { Vampirism } from './Vampirism';

export { Health, Regeneration, Vampirism };

export const BUILTIN_SKILLS: readonly SkillClass[] = [Health, Regeneration, Vampirism];

/**
 * Catalog with every built-in skill registered
 */
export const createDefaultSkillCatalog = (): SkillCatalog => {
  const catalog = new SkillCatalog();
  catalog.registerAll(BUILTIN_SKILLS);
  return catalog;
};

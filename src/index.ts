// Public API of the skill core
export { Skill, describeSkill, isSkillClass } from './models/Skill';
export type { SkillClass, SkillClassDescriptor } from './models/Skill';
export { TimedSkill } from './models/TimedSkill';
export { eventCallback, isTaggedCallback } from './models/EventCallback';
export type { CallbackTable, TaggedCallback } from './models/EventCallback';
export { buildCallbackRegistry, EMPTY_REGISTRY } from './models/CallbackRegistry';
export type { CallbackRegistry } from './models/CallbackRegistry';
export { Player } from './models/Player';
export type { PlayerOptions } from './models/Player';

export { TickScheduler, getTickScheduler } from './services/TickScheduler';
export type { Timer, TickSchedulerOptions, TickSchedulerStats } from './services/TickScheduler';
export { SkillLevelingService } from './services/SkillLevelingService';
export type { LevelChangeResult } from './services/SkillLevelingService';
export { SkillEventService } from './services/SkillEventService';
export type { EventDispatchResult, SkillEventServiceOptions } from './services/SkillEventService';
export { SkillCatalog } from './services/SkillCatalogService';

export { BUILTIN_SKILLS, createDefaultSkillCatalog, Health, Regeneration, Vampirism } from './skills';

export * from './shared/errors';
export { ErrorCode } from './shared/types';
export type { EventData } from './shared/types';
export type { GameEntity, PeriodicScheduler, TimerHandle } from './shared/interfaces';
export { GAME_EVENTS, SKILL_CONSTANTS } from './shared/constants';
export { config } from './shared/config';
export { Logger, LogLevel, getLogger, initializeLogger } from './shared/logger';

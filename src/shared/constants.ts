// Skill system constants

export const SKILL_CONSTANTS = {
  // Pricing
  UPGRADE_COST_PER_LEVEL: 5,
  DOWNGRADE_REFUND_PER_LEVEL: 4,

  // Built-in skills
  HEALTH_BONUS_PER_LEVEL: 25,
  HEALTH_MAX_LEVEL: 16,
  REGENERATION_HEAL_PER_LEVEL: 1,
  REGENERATION_MAX_LEVEL: 5,
  REGENERATION_INTERVAL: 1000, // 1 second in milliseconds
  VAMPIRISM_LIFESTEAL_PERCENT_PER_LEVEL: 5,
  VAMPIRISM_MAX_LEVEL: 6
} as const;

export const GAME_EVENTS = {
  PLAYER_SPAWN: 'player_spawn',
  PLAYER_DEATH: 'player_death',
  PLAYER_ATTACK: 'player_attack',
  PLAYER_VICTIM: 'player_victim',
  PLAYER_JUMP: 'player_jump'
} as const;

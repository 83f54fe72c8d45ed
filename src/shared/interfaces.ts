// Contracts between the skill core and the host game

/**
 * Handle on a recurring timer. Cancellation is final.
 */
export interface TimerHandle {
  readonly id: string;
  readonly isActive: boolean;
  cancel(): void;
}

/**
 * Scheduler that invokes a callback at a fixed interval until canceled
 */
export interface PeriodicScheduler {
  schedule(callback: () => void, intervalMs: number, name?: string): TimerHandle;
}

/**
 * The host engine's view of a player's body
 */
export interface GameEntity {
  health: number;
  maxHealth: number;
  readonly isDead: boolean;
}

// Shared types used across the skill system

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  CALLBACK_DECLARATION_ERROR = 'CALLBACK_DECLARATION_ERROR',
  CALLBACK_FAILURE = 'CALLBACK_FAILURE',
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
  INVALID_GAME_STATE = 'INVALID_GAME_STATE',
  INSUFFICIENT_RESOURCES = 'INSUFFICIENT_RESOURCES'
}

/**
 * Payload forwarded to event callbacks. Keys are the event's argument names.
 */
export type EventData = Readonly<Record<string, unknown>>;


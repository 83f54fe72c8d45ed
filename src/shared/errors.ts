// Custom error classes for the skill system
import { ZodError } from 'zod';
import { ErrorCode } from './types';

export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.timestamp = new Date();
    this.context = context || {};

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Validation error for input validation failures
 */
export class ValidationFailureError extends AppError {
  public readonly validationErrors: ValidationError[];

  constructor(
    message: string,
    validationErrors: ValidationError[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCode.VALIDATION_ERROR, true, context);
    this.validationErrors = validationErrors;
  }

  static fromZodError(zodError: ZodError, context?: Record<string, unknown>): ValidationFailureError {
    const validationErrors: ValidationError[] = zodError.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));

    return new ValidationFailureError('Validation failed', validationErrors, context);
  }
}

/**
 * Resource not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;

    super(message, ErrorCode.NOT_FOUND, true, context);
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, false, context);
  }
}

/**
 * Raised when an event callback is declared without any event names
 */
export class CallbackDeclarationError extends AppError {
  public readonly validationErrors: ValidationError[];

  constructor(message: string, validationErrors: ValidationError[] = []) {
    super(message, ErrorCode.CALLBACK_DECLARATION_ERROR, false, { validationErrors });
    this.validationErrors = validationErrors;
  }
}

/**
 * Raised when an abstract member runs without a subclass override
 */
export class NotImplementedError extends AppError {
  public readonly member: string;

  constructor(member: string, owner: string) {
    super(`${member} method not implemented by ${owner}`, ErrorCode.NOT_IMPLEMENTED, false, {
      member,
      owner
    });
    this.member = member;
  }
}

/**
 * Wraps an error thrown by a skill's event callback when callbacks run isolated
 */
export class SkillCallbackError extends AppError {
  public readonly eventName: string;
  public readonly classId: string;
  public readonly originalError: Error;

  constructor(eventName: string, classId: string, originalError: Error) {
    super(
      `Callback of skill '${classId}' failed on '${eventName}': ${originalError.message}`,
      ErrorCode.CALLBACK_FAILURE,
      true,
      { eventName, classId }
    );
    this.eventName = eventName;
    this.classId = classId;
    this.originalError = originalError;
  }
}

/**
 * Game-specific errors
 */
export class GameError extends AppError {
  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message, code, true, context);
  }
}

export class InsufficientResourcesError extends GameError {
  public readonly required: number;
  public readonly available: number;

  constructor(resource: string, required: number, available: number) {
    super(`Insufficient ${resource}: required ${required}, available ${available}`, ErrorCode.INSUFFICIENT_RESOURCES, {
      resource,
      required,
      available
    });
    this.required = required;
    this.available = available;
  }
}

export class InvalidGameStateError extends GameError {
  constructor(message: string, currentState?: string, expectedState?: string) {
    super(message, ErrorCode.INVALID_GAME_STATE, {
      currentState,
      expectedState
    });
  }
}

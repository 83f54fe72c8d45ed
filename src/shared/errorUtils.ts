// Utility functions for error handling across services
import { AppError, SkillCallbackError } from './errors';
import { getLogger } from './logger';

/**
 * Normalize anything thrown into an Error
 */
export const toError = (error: unknown): Error => {
  return error instanceof Error ? error : new Error(String(error));
};

/**
 * Run a single skill callback, logging and returning its failure instead of throwing
 */
export const withCallbackErrorHandling = (
  operation: () => void,
  context: {
    eventName: string;
    classId: string;
    callbackName?: string;
  }
): SkillCallbackError | undefined => {
  const logger = getLogger();

  try {
    const startTime = Date.now();
    operation();
    const duration = Date.now() - startTime;

    logger.logPerformance(`Callback ${context.classId}.${context.callbackName ?? 'anonymous'}`, duration, {
      eventName: context.eventName
    });

    return undefined;
  } catch (error) {
    const failure = new SkillCallbackError(context.eventName, context.classId, toError(error));

    logger.logAppError(failure, {
      callbackName: context.callbackName,
      cause: error instanceof AppError ? error.code : undefined
    });

    return failure;
  }
};

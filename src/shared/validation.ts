// Zod schemas for values crossing into the skill core
import { z } from 'zod';
import { ValidationFailureError } from './errors';

export const LevelSchema = z.number().int().nonnegative();

export const MaxLevelSchema = z.number().int().nonnegative().nullable();

export const EventNamesSchema = z.array(z.string().min(1, 'Event name must not be empty'))
  .min(1, 'At least one event name is required');

export const CreditsSchema = z.number().int().nonnegative();

export const IntervalSchema = z.number().int().positive();

/**
 * Parse a value or throw a ValidationFailureError describing every issue
 */
export const parseOrThrow = <T>(schema: z.ZodType<T>, value: unknown, context?: Record<string, unknown>): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationFailureError.fromZodError(result.error, context);
  }
  return result.data;
};

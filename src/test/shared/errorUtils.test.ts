// Unit tests for error utilities
import { describe, it, expect, vi } from 'vitest';
import { toError, withCallbackErrorHandling } from '../../shared/errorUtils';
import { SkillCallbackError } from '../../shared/errors';
import { getLogger } from '../../shared/logger';

describe('Error Utils', () => {
  describe('toError', () => {
    it('should pass errors through', () => {
      const error = new Error('kept');
      expect(toError(error)).toBe(error);
    });

    it('should wrap other thrown values', () => {
      expect(toError('text').message).toBe('text');
      expect(toError(42).message).toBe('42');
    });
  });

  describe('withCallbackErrorHandling', () => {
    const context = { eventName: 'player_spawn', classId: 'Health', callbackName: 'giveHealth' };

    it('should run the operation and log performance', () => {
      const operation = vi.fn();
      const performanceSpy = vi.spyOn(getLogger(), 'logPerformance');

      const result = withCallbackErrorHandling(operation, context);

      expect(result).toBeUndefined();
      expect(operation).toHaveBeenCalledTimes(1);
      expect(performanceSpy).toHaveBeenCalledWith('Callback Health.giveHealth', expect.any(Number), {
        eventName: 'player_spawn'
      });
    });

    it('should return and log a failure instead of throwing', () => {
      const errorSpy = vi.spyOn(getLogger(), 'logAppError');

      const result = withCallbackErrorHandling(() => {
        throw new Error('Callback failed');
      }, context);

      expect(result).toBeInstanceOf(SkillCallbackError);
      expect(result?.originalError.message).toBe('Callback failed');
      expect(errorSpy).toHaveBeenCalledWith(result, { callbackName: 'giveHealth', cause: undefined });
    });
  });
});

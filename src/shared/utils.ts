// Shared utility functions
import { v4 as uuidv4 } from 'uuid';

export class Utils {
  /**
   * Generate a unique ID using UUID v4
   */
  static generateId(): string {
    return uuidv4();
  }

  /**
   * Turn an identifier such as `Bonus_Health` into `Bonus Health`
   */
  static humanize(identifier: string): string {
    return identifier.replace(/_/g, ' ');
  }

  /**
   * Read a property only if the object declares it itself
   */
  static ownValue<T extends object, K extends keyof T>(target: T, key: K): T[K] | undefined {
    return Object.prototype.hasOwnProperty.call(target, key) ? target[key] : undefined;
  }
}

import { IIdGenerator } from '../../domain/common/IIdGenerator';

/**
 * ID generator that uses timestamps and random strings.
 * Generates IDs in the format: {prefix}_{timestamp}_{random}
 */
export class TimestampIdGenerator implements IIdGenerator {
  generate(prefix: string): string {
    const timestamp = Date.now();
    const random = Math.random().toString(36).slice(2, 11).padEnd(9, '0');
    return `${prefix}_${timestamp}_${random}`;
  }

  /**
   * Validate an ID format.
   * @returns true if ID matches prefix_timestamp_random
   */
  validate(id: string): boolean {
    const parts = id.split('_');
    if (parts.length < 3) return false;

    const timestamp = parseInt(parts[1], 10);
    if (isNaN(timestamp)) return false;

    return true;
  }
}

/**
 * Interface for generating unique IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with a prefix.
   * @param prefix - Prefix for the ID (e.g., 'proj', 'task', 'sess', 'ilog')
   * @example
   * generate('task') => 'task_1706884823457_d4e5f6a7b'
   */
  generate(prefix: string): string;

  /**
   * Validate an ID format.
   */
  validate?(id: string): boolean;
}

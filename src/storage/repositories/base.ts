/**
 * Base Repository Interface for Vocab Reminder
 *
 * Generic data access contract implemented by the keyed repositories.
 * Business logic works with domain models and never sees Drizzle rows.
 *
 * Cards are keyed by their numeric id; sessions and preferences are keyed
 * by a string (quiz token or owner), hence the key type parameter.
 */

import Database from 'better-sqlite3';

/**
 * Standard lookup, creation and deletion by key.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam K - The key type (`number` for cards, `string` for owners and tokens)
 * @typeParam CreateInput - The type for creating new entities
 *
 * @example
 * ```typescript
 * class CardRepository implements Repository<Card, number, CreateCardInput> {
 *   async findById(id: number): Promise<Card | null> {
 *     // implementation
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Repository<T, K, CreateInput> {
  /**
   * Retrieves an entity by its key.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: K): Promise<T | null>;

  /**
   * Creates a new entity and persists it to the database.
   */
  create(input: CreateInput): Promise<T>;

  /**
   * Deletes an entity. Deleting a missing key is not an error.
   *
   * @returns true when a row was removed
   */
  delete(id: K): Promise<boolean>;
}

/**
 * True when SQLite rejected a write because of a constraint (primary key,
 * unique index, check). Drizzle may wrap driver errors, so causes are
 * followed as well.
 */
export function isConstraintViolation(error: unknown): boolean {
  if (error instanceof Database.SqliteError) {
    return error.code.startsWith('SQLITE_CONSTRAINT');
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isConstraintViolation(error.cause);
  }
  return false;
}

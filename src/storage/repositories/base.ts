/**
 * Base Repository Interface
 *
 * Repositories abstract data access so the core works with domain models and
 * never with Drizzle rows. Each one takes the Drizzle database in its
 * constructor and maps rows through a local `mapToDomain`.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam Key - The identifier type
 */
export interface Repository<T, Key = string> {
  findById(id: Key): Promise<T | null>;
  findAll(): Promise<T[]>;
  delete(id: Key): Promise<void>;
}

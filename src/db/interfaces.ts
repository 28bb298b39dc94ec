/**
 * Database Interfaces
 *
 * Narrow contracts over TypeORM so services can be tested with plain mocks.
 */

export interface IRepository<T> {
    findById(id: string): Promise<T | null>;
    save(entity: T): Promise<T>;
}

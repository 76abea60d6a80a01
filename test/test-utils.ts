// test/test-utils.ts
import { QueryFailedError } from 'typeorm';
import type { DataSource, DeleteResult, EntityManager, EntityTarget, ObjectLiteral, Repository, UpdateResult } from 'typeorm';

type RepoMethods = 'find' | 'findOne' | 'findOneBy' | 'create' | 'save' | 'update' | 'delete';

/** TypeORM Repository mock, limited to what the services call */
export type RepoMock<T extends ObjectLiteral> = jest.Mocked<Pick<Repository<T>, RepoMethods>>;

export function makeRepoMock<T extends ObjectLiteral>(): RepoMock<T> {
  const updated: UpdateResult = { raw: [], affected: 1, generatedMaps: [] };
  const deleted: DeleteResult = { raw: [], affected: 1 };
  const repo = {
    find: jest.fn().mockResolvedValue([]),
    findOne: jest.fn().mockResolvedValue(null),
    findOneBy: jest.fn().mockResolvedValue(null),
    // create/save hand back what they were given, like an insert without generated columns
    create: jest.fn((entity: Partial<T>) => ({ ...entity })),
    save: jest.fn(async (entity: Partial<T>) => entity),
    update: jest.fn().mockResolvedValue(updated),
    delete: jest.fn().mockResolvedValue(deleted),
  };
  return repo as unknown as RepoMock<T>;
}

/** Hands a mock to a constructor that expects the full Repository. */
export function asRepository<T extends ObjectLiteral>(mock: RepoMock<T>): Repository<T> {
  return mock as unknown as Repository<T>;
}

export interface DataSourceMock {
  dataSource: DataSource;
  transaction: jest.Mock;
  query: jest.Mock;
}

/**
 * DataSource whose transaction() runs the callback right away against an
 * EntityManager that resolves repositories from `repos`.
 */
export function makeDataSourceMock(
  repos: Array<[EntityTarget<ObjectLiteral>, object]> = [],
  type: DataSource['options']['type'] = 'postgres',
): DataSourceMock {
  const byTarget = new Map(repos);
  const manager = {
    getRepository: (target: EntityTarget<ObjectLiteral>) => {
      const repo = byTarget.get(target);
      if (!repo) {
        throw new Error(`No repository mock for ${typeof target === 'function' ? target.name : String(target)}`);
      }
      return repo;
    },
  };
  const transaction = jest.fn(async (work: (em: EntityManager) => Promise<unknown>) =>
    work(manager as unknown as EntityManager),
  );
  const query = jest.fn().mockResolvedValue([{ 1: 1 }]);

  return { dataSource: { options: { type }, transaction, query } as unknown as DataSource, transaction, query };
}

/** The error TypeORM raises when a unique index rejects a write (sql.js flavour: no driver code). */
export function uniqueViolation(): QueryFailedError {
  return new QueryFailedError('INSERT INTO ...', [], new Error('UNIQUE constraint failed: specializations.name'));
}

import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';

// SQLite drivers share one query runner across the whole DataSource.
const SINGLE_CONNECTION_DRIVERS = new Set<string>(['sqljs', 'better-sqlite3', 'sqlite', 'capacitor', 'expo']);

/**
 * Runs write transactions. On pooled drivers each call gets its own
 * connection; on SQLite they are queued so two transactions never open on
 * the shared connection at once.
 */
@Injectable()
export class TransactionRunner {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly dataSource: DataSource) {}

  run<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    if (!SINGLE_CONNECTION_DRIVERS.has(this.dataSource.options.type)) {
      return this.dataSource.transaction(work);
    }

    const next = this.tail.then(() => this.dataSource.transaction(work));
    // the caller gets the rejection through `next`; the queue only waits for settlement
    this.tail = next.catch(() => undefined);
    return next;
  }
}

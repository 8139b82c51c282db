/**
 * Session store contract
 *
 * A store persists whole work day aggregates keyed by owner. Every load
 * returns a private copy, so a caller never observes a later save through an
 * object it already holds. The engine serializes writers per owner; stores
 * only need each individual save to be atomic.
 */

import type { WorkDayAggregate } from '../../types/tracking.js';

export interface SessionStore {
  /** The owner's most recent work day, or null if they have none */
  load(ownerId: string): Promise<WorkDayAggregate | null>;

  /** A specific work day of the owner, or null if it does not exist */
  loadById(ownerId: string, workDayId: string): Promise<WorkDayAggregate | null>;

  /** Every work day of the owner, oldest first */
  list(ownerId: string): Promise<WorkDayAggregate[]>;

  /** Insert or replace the aggregate and all of its children */
  save(aggregate: WorkDayAggregate): Promise<void>;

  close(): Promise<void>;
}

/**
 * In-process session store
 */

import type { WorkDayAggregate } from '../../types/tracking.js';
import type { SessionStore } from './types.js';
import { cloneAggregate } from '../tracking/state-machine.js';

export class InMemorySessionStore implements SessionStore {
  // owner id -> work days in creation order
  private days: Map<string, WorkDayAggregate[]> = new Map();

  async load(ownerId: string): Promise<WorkDayAggregate | null> {
    const days = this.days.get(ownerId);
    const latest = days?.[days.length - 1];
    return latest ? cloneAggregate(latest) : null;
  }

  async loadById(ownerId: string, workDayId: string): Promise<WorkDayAggregate | null> {
    const found = this.days.get(ownerId)?.find((d) => d.work_day.id === workDayId);
    return found ? cloneAggregate(found) : null;
  }

  async list(ownerId: string): Promise<WorkDayAggregate[]> {
    return (this.days.get(ownerId) ?? []).map(cloneAggregate);
  }

  async save(aggregate: WorkDayAggregate): Promise<void> {
    const ownerId = aggregate.work_day.owner_id;
    const days = this.days.get(ownerId) ?? [];
    const copy = cloneAggregate(aggregate);
    const index = days.findIndex((d) => d.work_day.id === aggregate.work_day.id);
    if (index === -1) {
      days.push(copy);
    } else {
      days[index] = copy;
    }
    this.days.set(ownerId, days);
  }

  async close(): Promise<void> {
    this.days.clear();
  }
}

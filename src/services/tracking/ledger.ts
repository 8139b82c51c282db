/**
 * Append-only ledger of manually logged time entries
 */

import type { AddEntryInput, TimeEntry, WorkDayAggregate } from '../../types/tracking.js';
import { ENTRY_TYPES } from '../../types/tracking.js';
import { notFound, validationError } from '../../utils/errors.js';
import { cloneAggregate } from './state-machine.js';

/**
 * Trim tags, drop empties and collapse duplicates (first occurrence wins)
 */
export function normalizeTags(tags: string[] | undefined): string[] {
  if (!tags) return [];
  const seen = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Check the caller-supplied fields of an entry
 */
export function validateEntryInput(input: AddEntryInput): void {
  if (!Number.isSafeInteger(input.duration_minutes) || input.duration_minutes <= 0) {
    throw validationError(`Duration must be a positive whole number of minutes, got ${input.duration_minutes}`);
  }
  if (!input.description.trim()) {
    throw validationError('Description is required');
  }
  if (input.entry_type !== undefined && !ENTRY_TYPES.includes(input.entry_type)) {
    throw validationError(`Unknown entry type: ${input.entry_type}`);
  }
}

/**
 * Pick the aggregate an entry belongs to.
 *
 * Without a work day id the owner's active day is used. With one, the named
 * day is used whatever its status, so entries can be backfilled onto ended days.
 */
export function resolveEntryTarget(
  latest: WorkDayAggregate | null,
  byId: WorkDayAggregate | null,
  workDayId: string | undefined
): WorkDayAggregate {
  if (workDayId !== undefined) {
    if (!byId) {
      throw notFound(`Work day not found: ${workDayId}`);
    }
    return byId;
  }
  if (!latest || latest.work_day.status !== 'active') {
    throw notFound('No active work day; pass a work day id to log time against a past day');
  }
  return latest;
}

/**
 * Append an entry to the end of the aggregate's ledger
 */
export function appendEntry(
  target: WorkDayAggregate,
  id: string,
  now: string,
  input: AddEntryInput
): { aggregate: WorkDayAggregate; entry: TimeEntry } {
  validateEntryInput(input);

  const entry: TimeEntry = {
    id,
    work_day_id: target.work_day.id,
    description: input.description.trim(),
    entry_type: input.entry_type ?? 'work',
    duration_minutes: input.duration_minutes,
    recorded_at: now,
    commit_hash: optionalText(input.commit_hash),
    jira_ticket: optionalText(input.jira_ticket),
    project: optionalText(input.project),
    billable: input.billable ?? true,
    tags: normalizeTags(input.tags),
  };

  const next = cloneAggregate(target);
  next.entries.push(entry);
  return { aggregate: next, entry: { ...entry, tags: [...entry.tags] } };
}

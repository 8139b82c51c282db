/**
 * Report aggregation
 *
 * Reports are computed from the aggregate on every call and never cached.
 * Meeting time and manual entries are added together without overlap
 * correction; a running meeting contributes nothing until it is stopped.
 */

import type {
  EntrySummary,
  Meeting,
  MeetingSummary,
  RangeReport,
  Report,
  ReportTotals,
  TimeEntry,
  WorkDayAggregate,
} from '../../types/tracking.js';
import { validationError } from '../../utils/errors.js';
import { formatDuration, toDateKey } from './duration.js';

export const NO_PROJECT = '(no project)';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Sort by timestamp, keeping insertion order for equal timestamps
 */
function chronological<T>(items: T[], timestampOf: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index, at: Date.parse(timestampOf(item)) }))
    .sort((a, b) => a.at - b.at || a.index - b.index)
    .map(({ item }) => item);
}

function addTo(buckets: Map<string, number>, key: string, minutes: number): void {
  buckets.set(key, (buckets.get(key) ?? 0) + minutes);
}

function summarizeMeeting(meeting: Meeting): MeetingSummary {
  return {
    id: meeting.id,
    title: meeting.title,
    meeting_type: meeting.meeting_type,
    attendee_count: meeting.attendee_count,
    status: meeting.status,
    started_at: meeting.started_at,
    stopped_at: meeting.stopped_at,
    duration_minutes: meeting.duration_minutes,
  };
}

function summarizeEntry(entry: TimeEntry): EntrySummary {
  return {
    id: entry.id,
    description: entry.description,
    entry_type: entry.entry_type,
    duration_minutes: entry.duration_minutes,
    recorded_at: entry.recorded_at,
    tags: [...entry.tags],
    project: entry.project,
    commit_hash: entry.commit_hash,
    jira_ticket: entry.jira_ticket,
    billable: entry.billable,
  };
}

/**
 * Totals and breakdowns over any set of meetings and entries
 */
function computeTotals(meetings: Meeting[], entries: TimeEntry[]): ReportTotals {
  const byTag = new Map<string, number>();
  const byProject = new Map<string, number>();
  const byMeetingType = new Map<string, number>();
  const byEntryType = new Map<string, number>();

  let entryMinutes = 0;
  let billableMinutes = 0;
  for (const entry of entries) {
    entryMinutes += entry.duration_minutes;
    if (entry.billable) billableMinutes += entry.duration_minutes;
    // An entry counts in full under every one of its tags
    for (const tag of new Set(entry.tags)) {
      addTo(byTag, tag, entry.duration_minutes);
    }
    addTo(byProject, entry.project ?? NO_PROJECT, entry.duration_minutes);
    addTo(byEntryType, entry.entry_type, entry.duration_minutes);
  }

  let meetingMinutes = 0;
  for (const meeting of meetings) {
    if (meeting.status !== 'stopped' || meeting.duration_minutes === null) continue;
    meetingMinutes += meeting.duration_minutes;
    addTo(byMeetingType, meeting.meeting_type, meeting.duration_minutes);
  }

  const totalMinutes = entryMinutes + meetingMinutes;

  return {
    total_minutes: totalMinutes,
    total_formatted: formatDuration(totalMinutes),
    meeting_minutes: meetingMinutes,
    entry_minutes: entryMinutes,
    billable_minutes: billableMinutes,
    meeting_count: meetings.length,
    entry_count: entries.length,
    breakdown_by_tag: Object.fromEntries(byTag),
    breakdown_by_project: Object.fromEntries(byProject),
    breakdown_by_meeting_type: Object.fromEntries(byMeetingType),
    breakdown_by_entry_type: Object.fromEntries(byEntryType),
  };
}

/**
 * Build the report for one work day
 */
export function buildReport(aggregate: WorkDayAggregate): Report {
  const { work_day } = aggregate;
  const meetings = chronological(aggregate.meetings, (m) => m.started_at);
  const entries = chronological(aggregate.entries, (e) => e.recorded_at);

  return {
    work_day: {
      id: work_day.id,
      owner_id: work_day.owner_id,
      status: work_day.status,
      started_at: work_day.started_at,
      ended_at: work_day.ended_at,
    },
    ...computeTotals(meetings, entries),
    meetings: meetings.map(summarizeMeeting),
    entries: entries.map(summarizeEntry),
  };
}

/**
 * Date a work day is filed under: the day it started, or was created if never started
 */
export function workDayDate(aggregate: WorkDayAggregate): string {
  return toDateKey(aggregate.work_day.started_at ?? aggregate.work_day.created_at);
}

/**
 * Build a report spanning every work day whose date falls in [from, to]
 */
export function buildRangeReport(
  ownerId: string,
  from: string,
  to: string,
  aggregates: WorkDayAggregate[]
): RangeReport {
  if (!DATE_KEY_PATTERN.test(from) || !DATE_KEY_PATTERN.test(to)) {
    throw validationError('Range dates must be YYYY-MM-DD');
  }
  if (from > to) {
    throw validationError(`Range start ${from} is after range end ${to}`);
  }

  const inRange = chronological(
    aggregates.filter((a) => {
      const date = workDayDate(a);
      return a.work_day.owner_id === ownerId && date >= from && date <= to;
    }),
    (a) => a.work_day.started_at ?? a.work_day.created_at
  );

  return {
    owner_id: ownerId,
    from,
    to,
    work_day_count: inRange.length,
    ...computeTotals(
      inRange.flatMap((a) => a.meetings),
      inRange.flatMap((a) => a.entries)
    ),
    days: inRange.map(buildReport),
  };
}

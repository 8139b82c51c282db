/**
 * Work day and meeting lifecycle transitions
 *
 * Every function here is pure: it takes the owner's latest aggregate (or null)
 * and returns a new aggregate, or throws a TrackingError and leaves the input
 * untouched. Timestamps and ids are supplied by the caller.
 *
 *   work day:  not_started --start--> active --stop--> ended
 *   meeting:   (none) --start--> running --stop--> stopped
 */

import type {
  Meeting,
  StartMeetingInput,
  WorkDay,
  WorkDayAggregate,
} from '../../types/tracking.js';
import { MEETING_TYPES } from '../../types/tracking.js';
import { conflict, invalidState, notFound, validationError } from '../../utils/errors.js';
import { meetingDurationMinutes } from './duration.js';

export const MAX_MEETING_TITLE_LENGTH = 200;

export function cloneAggregate(aggregate: WorkDayAggregate): WorkDayAggregate {
  return {
    work_day: { ...aggregate.work_day },
    meetings: aggregate.meetings.map((m) => ({ ...m })),
    entries: aggregate.entries.map((e) => ({ ...e, tags: [...e.tags] })),
  };
}

export function findRunningMeeting(aggregate: WorkDayAggregate): Meeting | null {
  return aggregate.meetings.find((m) => m.status === 'running') ?? null;
}

function newWorkDay(ownerId: string, id: string, now: string, initialActivity: string | null): WorkDay {
  return {
    id,
    owner_id: ownerId,
    status: 'not_started',
    created_at: now,
    started_at: null,
    ended_at: null,
    initial_activity: initialActivity,
    current_activity: null,
  };
}

function normalizeText(value: string | undefined | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Create a not-yet-started work day
 */
export function prepareWorkDay(
  latest: WorkDayAggregate | null,
  ownerId: string,
  id: string,
  now: string,
  initialActivity?: string
): WorkDayAggregate {
  if (latest?.work_day.status === 'active') {
    throw conflict(`Work day ${latest.work_day.id} is already active`);
  }
  if (latest?.work_day.status === 'not_started') {
    throw conflict(`Work day ${latest.work_day.id} is already prepared`);
  }

  return {
    work_day: newWorkDay(ownerId, id, now, normalizeText(initialActivity)),
    meetings: [],
    entries: [],
  };
}

/**
 * Start the owner's work day. A prepared (not_started) day is reused,
 * otherwise a fresh one is created. Ended days are never reopened.
 */
export function startWorkDay(
  latest: WorkDayAggregate | null,
  ownerId: string,
  id: string,
  now: string,
  initialActivity?: string
): WorkDayAggregate {
  if (latest?.work_day.status === 'active') {
    throw conflict(`Work day ${latest.work_day.id} is already active`);
  }

  const next: WorkDayAggregate =
    latest?.work_day.status === 'not_started'
      ? cloneAggregate(latest)
      : { work_day: newWorkDay(ownerId, id, now, null), meetings: [], entries: [] };

  const activity = normalizeText(initialActivity) ?? next.work_day.initial_activity;
  next.work_day.status = 'active';
  next.work_day.started_at = now;
  next.work_day.initial_activity = activity;
  next.work_day.current_activity = activity;
  return next;
}

/**
 * End the active work day. A meeting still running is stopped first,
 * at the same timestamp, within the same transition.
 */
export function stopWorkDay(latest: WorkDayAggregate | null, now: string): WorkDayAggregate {
  if (!latest) {
    throw notFound('No work day found');
  }
  if (latest.work_day.status !== 'active') {
    throw invalidState(`Work day ${latest.work_day.id} is not active (status: ${latest.work_day.status})`);
  }

  const next = cloneAggregate(latest);
  for (const meeting of next.meetings) {
    if (meeting.status === 'running') {
      closeMeeting(meeting, now);
    }
  }

  next.work_day.status = 'ended';
  next.work_day.ended_at = now;
  next.work_day.current_activity = null;
  return next;
}

/**
 * Replace the description of what the owner is working on right now
 */
export function setActivity(latest: WorkDayAggregate | null, activity: string): WorkDayAggregate {
  const text = normalizeText(activity);
  if (!text) {
    throw validationError('Activity cannot be empty');
  }
  if (!latest || latest.work_day.status !== 'active') {
    throw notFound('No active work day');
  }

  const next = cloneAggregate(latest);
  next.work_day.current_activity = text;
  return next;
}

function validateMeetingInput(input: StartMeetingInput): void {
  const title = input.title.trim();
  if (!title) {
    throw validationError('Meeting title is required');
  }
  if (title.length > MAX_MEETING_TITLE_LENGTH) {
    throw validationError(`Meeting title must be at most ${MAX_MEETING_TITLE_LENGTH} characters`);
  }
  if (!Number.isInteger(input.attendee_count) || input.attendee_count < 0) {
    throw validationError(`Attendee count must be a non-negative integer, got ${input.attendee_count}`);
  }
  if (!MEETING_TYPES.includes(input.meeting_type)) {
    throw validationError(`Unknown meeting type: ${String(input.meeting_type)}`);
  }
}

/**
 * Start a meeting timer under the active work day
 */
export function startMeeting(
  latest: WorkDayAggregate | null,
  id: string,
  now: string,
  input: StartMeetingInput
): { aggregate: WorkDayAggregate; meeting: Meeting } {
  validateMeetingInput(input);

  if (!latest || latest.work_day.status !== 'active') {
    throw notFound('No active work day; start the work day before starting a meeting');
  }

  const running = findRunningMeeting(latest);
  if (running) {
    throw conflict(`Meeting "${running.title}" (${running.id}) is already running`);
  }

  const meeting: Meeting = {
    id,
    work_day_id: latest.work_day.id,
    title: input.title.trim(),
    meeting_type: input.meeting_type,
    attendee_count: input.attendee_count,
    description: normalizeText(input.description),
    status: 'running',
    started_at: now,
    stopped_at: null,
    duration_minutes: null,
  };

  const next = cloneAggregate(latest);
  next.meetings.push(meeting);
  return { aggregate: next, meeting: { ...meeting } };
}

function closeMeeting(meeting: Meeting, now: string): void {
  meeting.status = 'stopped';
  meeting.stopped_at = now;
  meeting.duration_minutes = meetingDurationMinutes(meeting.started_at, now);
}

/**
 * Stop a running meeting and fix its duration
 */
export function stopMeeting(
  latest: WorkDayAggregate | null,
  meetingId: string,
  now: string
): { aggregate: WorkDayAggregate; meeting: Meeting } {
  if (!latest) {
    throw notFound('No work day found');
  }

  const next = cloneAggregate(latest);
  const meeting = next.meetings.find((m) => m.id === meetingId);
  if (!meeting) {
    throw notFound(`Meeting not found: ${meetingId}`);
  }
  if (meeting.status !== 'running') {
    throw invalidState(`Meeting ${meetingId} is not running`);
  }

  closeMeeting(meeting, now);
  return { aggregate: next, meeting: { ...meeting } };
}

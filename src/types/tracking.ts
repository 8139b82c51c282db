/**
 * Work day, meeting and time entry types
 */

export type WorkDayStatus = 'not_started' | 'active' | 'ended';

export type MeetingStatus = 'running' | 'stopped';

export const MEETING_TYPES = [
  'standup',
  'planning',
  'review',
  'retrospective',
  'one_on_one',
  'client_call',
  'training',
  'interview',
  'brainstorming',
  'demo',
  'other',
] as const;

export type MeetingType = (typeof MEETING_TYPES)[number];

export const ENTRY_TYPES = [
  'work',
  'meeting',
  'break',
  'training',
  'admin',
  'research',
  'debugging',
  'review',
  'documentation',
] as const;

export type EntryType = (typeof ENTRY_TYPES)[number];

export interface WorkDay {
  id: string;
  owner_id: string;
  status: WorkDayStatus;
  created_at: string; // ISO 8601
  started_at: string | null;
  ended_at: string | null;
  initial_activity: string | null;
  current_activity: string | null;
}

export interface Meeting {
  id: string;
  work_day_id: string;
  title: string;
  meeting_type: MeetingType;
  attendee_count: number;
  description: string | null;
  status: MeetingStatus;
  started_at: string;
  stopped_at: string | null;
  duration_minutes: number | null; // null while running
}

export interface TimeEntry {
  id: string;
  work_day_id: string;
  description: string;
  entry_type: EntryType;
  duration_minutes: number;
  recorded_at: string;
  commit_hash: string | null;
  jira_ticket: string | null;
  project: string | null;
  billable: boolean;
  tags: string[];
}

/**
 * A work day together with the meetings and entries it owns.
 * Loaded and saved as one unit.
 */
export interface WorkDayAggregate {
  work_day: WorkDay;
  meetings: Meeting[];
  entries: TimeEntry[];
}

export interface TrackingStatus {
  work_day: WorkDay | null;
  running_meeting: Meeting | null;
  elapsed_minutes: number | null;
  // logged on the latest work day: entries plus stopped meetings
  total_minutes: number;
  entry_count: number;
}

export interface StartMeetingInput {
  title: string;
  meeting_type: MeetingType;
  attendee_count: number;
  description?: string | undefined;
}

export interface AddEntryInput {
  work_day_id?: string | undefined;
  description: string;
  entry_type?: EntryType | undefined;
  duration_minutes: number;
  commit_hash?: string | undefined;
  jira_ticket?: string | undefined;
  project?: string | undefined;
  billable?: boolean | undefined;
  tags?: string[] | undefined;
}

export interface MeetingSummary {
  id: string;
  title: string;
  meeting_type: MeetingType;
  attendee_count: number;
  status: MeetingStatus;
  started_at: string;
  stopped_at: string | null;
  duration_minutes: number | null;
}

export interface EntrySummary {
  id: string;
  description: string;
  entry_type: EntryType;
  duration_minutes: number;
  recorded_at: string;
  tags: string[];
  project: string | null;
  commit_hash: string | null;
  jira_ticket: string | null;
  billable: boolean;
}

export interface ReportTotals {
  total_minutes: number;
  total_formatted: string;
  meeting_minutes: number;
  entry_minutes: number;
  billable_minutes: number;
  meeting_count: number;
  entry_count: number;
  breakdown_by_tag: Record<string, number>;
  breakdown_by_project: Record<string, number>;
  breakdown_by_meeting_type: Record<string, number>;
  breakdown_by_entry_type: Record<string, number>;
}

export interface Report extends ReportTotals {
  work_day: {
    id: string;
    owner_id: string;
    status: WorkDayStatus;
    started_at: string | null;
    ended_at: string | null;
  };
  meetings: MeetingSummary[];
  entries: EntrySummary[];
}

export interface RangeReport extends ReportTotals {
  owner_id: string;
  from: string; // YYYY-MM-DD
  to: string;
  work_day_count: number;
  days: Report[];
}

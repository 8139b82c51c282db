/**
 * CSV export: one row per meeting and per time entry
 */

import type { RangeReport, Report } from '../../types/index.js';
import type { ExportAdapter } from './types.js';

export const CSV_COLUMNS = [
  'work_day_id',
  'kind',
  'id',
  'started_at',
  'title',
  'category',
  'tags',
  'jira_ticket',
  'commit_hash',
  'billable',
  'duration_minutes',
  'entry_type',
] as const;

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string | number | boolean | null): string {
  if (value === null) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function reportRows(report: Report): string[] {
  const rows: string[] = [];
  const dayId = report.work_day.id;

  for (const m of report.meetings) {
    rows.push(
      [dayId, 'meeting', m.id, m.started_at, m.title, m.meeting_type, '', '', '', '', m.duration_minutes, '']
        .map(escapeCsvField)
        .join(',')
    );
  }
  for (const e of report.entries) {
    rows.push(
      [
        dayId,
        'entry',
        e.id,
        e.recorded_at,
        e.description,
        e.project,
        e.tags.join(';'),
        e.jira_ticket,
        e.commit_hash,
        e.billable,
        e.duration_minutes,
        e.entry_type,
      ]
        .map(escapeCsvField)
        .join(',')
    );
  }
  return rows;
}

function toCsv(rows: string[]): string {
  return [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n';
}

export const csvExporter: ExportAdapter<string> = {
  format: 'csv',
  contentType: 'text/csv',

  render(report: Report): string {
    return toCsv(reportRows(report));
  },

  renderRange(report: RangeReport): string {
    return toCsv(report.days.flatMap(reportRows));
  },
};

/**
 * Markdown export: YAML frontmatter with the totals, tables for the detail
 */

import type { EntrySummary, MeetingSummary, RangeReport, Report, ReportTotals } from '../../types/index.js';
import { formatDuration } from '../tracking/duration.js';
import { stringifyFrontmatter } from '../../utils/frontmatter.js';
import type { ExportAdapter } from './types.js';

function cell(value: string | number | null): string {
  if (value === null || value === '') return '-';
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * HH:MM of an ISO timestamp (UTC)
 */
function clockTime(timestamp: string | null): string {
  return timestamp ? timestamp.slice(11, 16) : '-';
}

function meetingTable(meetings: MeetingSummary[]): string {
  if (meetings.length === 0) return '_No meetings._\n';
  let table = '| Started | Title | Type | Attendees | Duration |\n';
  table += '|---|---|---|---|---|\n';
  for (const m of meetings) {
    const duration = m.duration_minutes === null ? 'running' : formatDuration(m.duration_minutes);
    table += `| ${clockTime(m.started_at)} | ${cell(m.title)} | ${m.meeting_type} | ${m.attendee_count} | ${duration} |\n`;
  }
  return table;
}

function entryTable(entries: EntrySummary[]): string {
  if (entries.length === 0) return '_No time entries._\n';
  let table = '| Recorded | Description | Type | Duration | Project | Tags | Ticket | Commit |\n';
  table += '|---|---|---|---|---|---|---|---|\n';
  for (const e of entries) {
    table +=
      `| ${clockTime(e.recorded_at)} | ${cell(e.description)} | ${e.entry_type} | ${formatDuration(e.duration_minutes)} ` +
      `| ${cell(e.project)} | ${cell(e.tags.join(', '))} | ${cell(e.jira_ticket)} | ${cell(e.commit_hash)} |\n`;
  }
  return table;
}

function breakdownList(title: string, breakdown: Record<string, number>): string {
  const rows = Object.entries(breakdown).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (rows.length === 0) return '';
  let section = `\n## ${title}\n\n`;
  for (const [key, minutes] of rows) {
    section += `- ${key}: ${formatDuration(minutes)}\n`;
  }
  return section;
}

function totalsFrontmatter(totals: ReportTotals): Record<string, unknown> {
  return {
    total_minutes: totals.total_minutes,
    meeting_minutes: totals.meeting_minutes,
    entry_minutes: totals.entry_minutes,
    billable_minutes: totals.billable_minutes,
    meeting_count: totals.meeting_count,
    entry_count: totals.entry_count,
  };
}

function totalsLine(totals: ReportTotals): string {
  return (
    `**Total**: ${totals.total_formatted} ` +
    `(meetings ${formatDuration(totals.meeting_minutes)}, entries ${formatDuration(totals.entry_minutes)})\n`
  );
}

function dayBody(report: Report, heading: string): string {
  const { work_day } = report;
  let body = `${heading}\n\n`;
  body += `**Status**: ${work_day.status}\n`;
  body += `**Started**: ${work_day.started_at ?? '-'}\n`;
  body += `**Ended**: ${work_day.ended_at ?? '-'}\n`;
  body += totalsLine(report);
  body += `\n## Meetings\n\n${meetingTable(report.meetings)}`;
  body += `\n## Entries\n\n${entryTable(report.entries)}`;
  body += breakdownList('By Tag', report.breakdown_by_tag);
  body += breakdownList('By Project', report.breakdown_by_project);
  body += breakdownList('By Entry Type', report.breakdown_by_entry_type);
  return body;
}

export const markdownExporter: ExportAdapter<string> = {
  format: 'markdown',
  contentType: 'text/markdown',

  render(report: Report): string {
    const date = (report.work_day.started_at ?? '').slice(0, 10) || 'not started';
    return stringifyFrontmatter(
      {
        type: 'worklog_report',
        work_day_id: report.work_day.id,
        owner: report.work_day.owner_id,
        status: report.work_day.status,
        ...totalsFrontmatter(report),
      },
      dayBody(report, `# Work Report: ${date}`)
    );
  },

  renderRange(report: RangeReport): string {
    let body = `# Work Report: ${report.from} to ${report.to}\n\n`;
    body += `**Work days**: ${report.work_day_count}\n`;
    body += totalsLine(report);
    body += breakdownList('By Tag', report.breakdown_by_tag);
    body += breakdownList('By Project', report.breakdown_by_project);
    body += breakdownList('By Meeting Type', report.breakdown_by_meeting_type);
    body += breakdownList('By Entry Type', report.breakdown_by_entry_type);
    for (const day of report.days) {
      body += `\n${dayBody(day, `## ${(day.work_day.started_at ?? '').slice(0, 10) || 'not started'}`)}`;
    }
    return stringifyFrontmatter(
      {
        type: 'worklog_range_report',
        owner: report.owner_id,
        from: report.from,
        to: report.to,
        work_day_count: report.work_day_count,
        ...totalsFrontmatter(report),
      },
      body
    );
  },
};

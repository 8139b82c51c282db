/**
 * Tests for report exporters
 */

import { describe, it, expect } from 'vitest';
import { buildRangeReport, buildReport } from '../../../src/services/tracking/aggregator.js';
import {
  CSV_COLUMNS,
  csvExporter,
  escapeCsvField,
  getExporter,
  jsonExporter,
  listExportFormats,
  markdownExporter,
  registerExporter,
} from '../../../src/services/export/index.js';
import { parseFrontmatter } from '../../../src/utils/frontmatter.js';
import type { WorkDayAggregate } from '../../../src/types/index.js';

function sampleDay(id: string, date: string): WorkDayAggregate {
  return {
    work_day: {
      id,
      owner_id: 'alice',
      status: 'ended',
      created_at: `${date}T09:00:00.000Z`,
      started_at: `${date}T09:00:00.000Z`,
      ended_at: `${date}T17:00:00.000Z`,
      initial_activity: null,
      current_activity: null,
    },
    meetings: [
      {
        id: `${id}-m1`,
        work_day_id: id,
        title: 'Standup',
        meeting_type: 'standup',
        attendee_count: 4,
        description: null,
        status: 'stopped',
        started_at: `${date}T09:05:00.000Z`,
        stopped_at: `${date}T09:20:00.000Z`,
        duration_minutes: 15,
      },
    ],
    entries: [
      {
        id: `${id}-e1`,
        work_day_id: id,
        description: 'Fix login, "quickly"',
        entry_type: 'debugging',
        duration_minutes: 90,
        recorded_at: `${date}T10:00:00.000Z`,
        commit_hash: 'abc123',
        jira_ticket: 'OPS-7',
        project: 'api',
        billable: true,
        tags: ['backend', 'bug'],
      },
      {
        id: `${id}-e2`,
        work_day_id: id,
        description: 'Docs',
        entry_type: 'documentation',
        duration_minutes: 30,
        recorded_at: `${date}T11:00:00.000Z`,
        commit_hash: null,
        jira_ticket: null,
        project: null,
        billable: false,
        tags: [],
      },
    ],
  };
}

const report = buildReport(sampleDay('day-1', '2026-03-02'));

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('Standup')).toBe('Standup');
    expect(escapeCsvField(15)).toBe('15');
    expect(escapeCsvField(false)).toBe('false');
    expect(escapeCsvField(null)).toBe('');
  });

  it('quotes delimiters, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('csvExporter', () => {
  it('writes a header, one row per meeting and one per entry', () => {
    const lines = csvExporter.render(report).split('\n');
    expect(lines).toEqual([
      CSV_COLUMNS.join(','),
      'day-1,meeting,day-1-m1,2026-03-02T09:05:00.000Z,Standup,standup,,,,,15,',
      'day-1,entry,day-1-e1,2026-03-02T10:00:00.000Z,"Fix login, ""quickly""",api,backend;bug,OPS-7,abc123,true,90,debugging',
      'day-1,entry,day-1-e2,2026-03-02T11:00:00.000Z,Docs,,,,,false,30,documentation',
      '',
    ]);
  });

  it('concatenates the rows of every day in a range', () => {
    const range = buildRangeReport('alice', '2026-03-02', '2026-03-03', [
      sampleDay('day-2', '2026-03-03'),
      sampleDay('day-1', '2026-03-02'),
    ]);
    const lines = csvExporter.renderRange(range).trimEnd().split('\n');
    expect(lines).toHaveLength(7);
    expect(lines[1]?.startsWith('day-1,meeting,')).toBe(true);
    expect(lines[4]?.startsWith('day-2,meeting,')).toBe(true);
  });
});

describe('markdownExporter', () => {
  it('puts the totals in frontmatter', () => {
    const { frontmatter } = parseFrontmatter(markdownExporter.render(report));
    expect(frontmatter).toEqual({
      type: 'worklog_report',
      work_day_id: 'day-1',
      owner: 'alice',
      status: 'ended',
      total_minutes: 135,
      meeting_minutes: 15,
      entry_minutes: 120,
      billable_minutes: 90,
      meeting_count: 1,
      entry_count: 2,
    });
  });

  it('renders the day as headings, tables and breakdowns', () => {
    const { body } = parseFrontmatter(markdownExporter.render(report));
    const lines = body.split('\n');

    expect(lines[0]).toBe('# Work Report: 2026-03-02');
    expect(lines).toContain('**Total**: 2h 15m (meetings 15m, entries 2h)');
    expect(lines).toContain('| 09:05 | Standup | standup | 4 | 15m |');
    expect(lines).toContain('| 10:00 | Fix login, "quickly" | debugging | 1h 30m | api | backend, bug | OPS-7 | abc123 |');
    expect(lines).toContain('| 11:00 | Docs | documentation | 30m | - | - | - | - |');
    expect(lines).toContain('- api: 1h 30m');
    expect(lines).toContain('- (no project): 30m');
    expect(lines).toContain('## By Entry Type');
    expect(lines).toContain('- debugging: 1h 30m');
    expect(lines).toContain('- documentation: 30m');
  });

  it('lists tags with equal time alphabetically', () => {
    const { body } = parseFrontmatter(markdownExporter.render(report));
    const lines = body.split('\n');
    const backend = lines.indexOf('- backend: 1h 30m');
    expect(backend).toBeGreaterThan(-1);
    expect(lines[backend + 1]).toBe('- bug: 1h 30m');
  });

  it('renders a range with one section per day', () => {
    const range = buildRangeReport('alice', '2026-03-02', '2026-03-03', [
      sampleDay('day-1', '2026-03-02'),
      sampleDay('day-2', '2026-03-03'),
    ]);
    const { frontmatter, body } = parseFrontmatter(markdownExporter.renderRange(range));

    expect(frontmatter.type).toBe('worklog_range_report');
    expect(frontmatter.work_day_count).toBe(2);
    expect(frontmatter.total_minutes).toBe(270);

    const lines = body.split('\n');
    expect(lines[0]).toBe('# Work Report: 2026-03-02 to 2026-03-03');
    expect(lines).toContain('## 2026-03-02');
    expect(lines).toContain('## 2026-03-03');
    expect(lines).toContain('- standup: 30m');
  });
});

describe('exporter registry', () => {
  it('ships json, markdown and csv', () => {
    expect(listExportFormats()).toEqual(expect.arrayContaining(['json', 'markdown', 'csv']));
    expect(getExporter('csv')).toBe(csvExporter);
    expect(getExporter('pdf')).toBeUndefined();
  });

  it('renders json that parses back to the report', () => {
    expect(JSON.parse(jsonExporter.render(report))).toEqual(report);
  });

  it('accepts additional exporters', () => {
    registerExporter({
      format: 'summary',
      contentType: 'text/plain',
      render: (r) => `${r.work_day.id}: ${r.total_formatted}`,
      renderRange: (r) => `${r.from}..${r.to}: ${r.total_formatted}`,
    });

    expect(getExporter('summary')?.render(report)).toBe('day-1: 2h 15m');
    expect(listExportFormats()).toContain('summary');
  });
});

/**
 * SQLite session store
 *
 * One row per work day, meetings and time entries in child tables ordered by
 * their position in the aggregate. Loads run inside a read transaction so an
 * aggregate is always read as of a single commit.
 *
 * Work days are ordered by insertion (rowid), never by their timestamps: the
 * latest day is the last one created even if the clock stepped back.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Meeting, TimeEntry, WorkDay, WorkDayAggregate } from '../../types/tracking.js';
import { ENTRY_TYPES, MEETING_TYPES } from '../../types/tracking.js';
import { logger } from '../../utils/logger.js';
import type { SessionStore } from './types.js';

// Schema version for migrations
export const SCHEMA_VERSION = 2;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS work_days (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TEXT NOT NULL,
    started_at TEXT,
    ended_at TEXT,
    initial_activity TEXT,
    current_activity TEXT
);

CREATE TABLE IF NOT EXISTS meetings (
    id TEXT PRIMARY KEY,
    work_day_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    title TEXT NOT NULL,
    meeting_type TEXT NOT NULL,
    attendee_count INTEGER NOT NULL,
    description TEXT,
    status TEXT NOT NULL,
    started_at TEXT NOT NULL,
    stopped_at TEXT,
    duration_minutes INTEGER,
    FOREIGN KEY (work_day_id) REFERENCES work_days(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS time_entries (
    id TEXT PRIMARY KEY,
    work_day_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    description TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
    recorded_at TEXT NOT NULL,
    commit_hash TEXT,
    jira_ticket TEXT,
    project TEXT,
    billable INTEGER NOT NULL DEFAULT 1,
    tags TEXT NOT NULL DEFAULT '[]',
    FOREIGN KEY (work_day_id) REFERENCES work_days(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY
);

CREATE INDEX IF NOT EXISTS idx_work_days_owner ON work_days(owner_id);
CREATE INDEX IF NOT EXISTS idx_meetings_work_day ON meetings(work_day_id);
CREATE INDEX IF NOT EXISTS idx_time_entries_work_day ON time_entries(work_day_id);
`;

// Row schemas: rows are validated on the way out of the database
const workDayRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  status: z.enum(['not_started', 'active', 'ended']),
  created_at: z.string(),
  started_at: z.string().nullable(),
  ended_at: z.string().nullable(),
  initial_activity: z.string().nullable(),
  current_activity: z.string().nullable(),
});

const meetingRowSchema = z.object({
  id: z.string(),
  work_day_id: z.string(),
  title: z.string(),
  meeting_type: z.enum(MEETING_TYPES),
  attendee_count: z.number().int(),
  description: z.string().nullable(),
  status: z.enum(['running', 'stopped']),
  started_at: z.string(),
  stopped_at: z.string().nullable(),
  duration_minutes: z.number().int().nullable(),
});

const entryRowSchema = z.object({
  id: z.string(),
  work_day_id: z.string(),
  description: z.string(),
  entry_type: z.enum(ENTRY_TYPES),
  duration_minutes: z.number().int(),
  recorded_at: z.string(),
  commit_hash: z.string().nullable(),
  jira_ticket: z.string().nullable(),
  project: z.string().nullable(),
  billable: z.number().transform((v) => v !== 0),
  tags: z.string().transform((v, ctx) => {
    const parsed = z.array(z.string()).safeParse(JSON.parse(v));
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'tags must be a JSON string array' });
      return z.NEVER;
    }
    return parsed.data;
  }),
});

/**
 * Initialize database schema
 */
export function initializeSchema(db: Database.Database): void {
  const hasVersionTable = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  let currentVersion = 0;
  if (hasVersionTable) {
    const row = z
      .object({ version: z.number() })
      .optional()
      .parse(db.prepare('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1').get());
    currentVersion = row?.version ?? 0;
  }

  if (currentVersion < SCHEMA_VERSION) {
    logger.debug(`Migrating database from version ${currentVersion} to ${SCHEMA_VERSION}`);
    runMigrations(db, currentVersion);
  }
}

/**
 * Run database migrations
 */
function runMigrations(db: Database.Database, fromVersion: number): void {
  db.exec('BEGIN TRANSACTION');

  try {
    if (fromVersion < 1) {
      db.exec(SCHEMA_SQL);
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(1);
    }

    if (fromVersion < 2) {
      // Entry categories
      db.exec(`ALTER TABLE time_entries ADD COLUMN entry_type TEXT NOT NULL DEFAULT 'work';`);
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(2);
    }

    db.exec('COMMIT');
    logger.debug('Database migration completed');
  } catch (error) {
    db.exec('ROLLBACK');
    logger.error('Database migration failed', error);
    throw error;
  }
}

/**
 * Open (and if needed create) a worklog database
 */
export function createDatabase(dbPath: string): Database.Database {
  logger.info(`Opening database at: ${dbPath}`);

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  initializeSchema(db);

  return db;
}

export class SqliteSessionStore implements SessionStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(dbPath: string): SqliteSessionStore {
    return new SqliteSessionStore(createDatabase(dbPath));
  }

  private readChildren(workDay: WorkDay): WorkDayAggregate {
    const meetings: Meeting[] = this.db
      .prepare('SELECT * FROM meetings WHERE work_day_id = ? ORDER BY position')
      .all(workDay.id)
      .map((row) => meetingRowSchema.parse(row));

    const entries: TimeEntry[] = this.db
      .prepare('SELECT * FROM time_entries WHERE work_day_id = ? ORDER BY position')
      .all(workDay.id)
      .map((row) => entryRowSchema.parse(row));

    return { work_day: workDay, meetings, entries };
  }

  private readWorkDay(sql: string, ...params: string[]): WorkDayAggregate | null {
    const row = this.db.prepare(sql).get(...params);
    if (row === undefined) return null;
    return this.readChildren(workDayRowSchema.parse(row));
  }

  async load(ownerId: string): Promise<WorkDayAggregate | null> {
    return this.db.transaction(() =>
      this.readWorkDay(
        'SELECT * FROM work_days WHERE owner_id = ? ORDER BY rowid DESC LIMIT 1',
        ownerId
      )
    )();
  }

  async loadById(ownerId: string, workDayId: string): Promise<WorkDayAggregate | null> {
    return this.db.transaction(() =>
      this.readWorkDay('SELECT * FROM work_days WHERE owner_id = ? AND id = ?', ownerId, workDayId)
    )();
  }

  async list(ownerId: string): Promise<WorkDayAggregate[]> {
    return this.db.transaction(() =>
      this.db
        .prepare('SELECT * FROM work_days WHERE owner_id = ? ORDER BY rowid')
        .all(ownerId)
        .map((row) => this.readChildren(workDayRowSchema.parse(row)))
    )();
  }

  async save(aggregate: WorkDayAggregate): Promise<void> {
    const { work_day, meetings, entries } = aggregate;

    const upsertWorkDay = this.db.prepare(`
      INSERT INTO work_days (id, owner_id, status, created_at, started_at, ended_at, initial_activity, current_activity)
      VALUES (@id, @owner_id, @status, @created_at, @started_at, @ended_at, @initial_activity, @current_activity)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        started_at = excluded.started_at,
        ended_at = excluded.ended_at,
        initial_activity = excluded.initial_activity,
        current_activity = excluded.current_activity
    `);
    const insertMeeting = this.db.prepare(`
      INSERT INTO meetings (id, work_day_id, position, title, meeting_type, attendee_count, description, status, started_at, stopped_at, duration_minutes)
      VALUES (@id, @work_day_id, @position, @title, @meeting_type, @attendee_count, @description, @status, @started_at, @stopped_at, @duration_minutes)
    `);
    const insertEntry = this.db.prepare(`
      INSERT INTO time_entries (id, work_day_id, position, description, entry_type, duration_minutes, recorded_at, commit_hash, jira_ticket, project, billable, tags)
      VALUES (@id, @work_day_id, @position, @description, @entry_type, @duration_minutes, @recorded_at, @commit_hash, @jira_ticket, @project, @billable, @tags)
    `);

    this.db.transaction(() => {
      upsertWorkDay.run({ ...work_day });
      this.db.prepare('DELETE FROM meetings WHERE work_day_id = ?').run(work_day.id);
      this.db.prepare('DELETE FROM time_entries WHERE work_day_id = ?').run(work_day.id);
      meetings.forEach((meeting, position) => {
        insertMeeting.run({ ...meeting, position });
      });
      entries.forEach((entry, position) => {
        insertEntry.run({
          ...entry,
          position,
          billable: entry.billable ? 1 : 0,
          tags: JSON.stringify(entry.tags),
        });
      });
    })();

    logger.debug(`Saved work day ${work_day.id} (${meetings.length} meetings, ${entries.length} entries)`);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Tests for the tracking engine over in-memory and SQLite stores
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TrackingEngine } from '../../../src/services/tracking/engine.js';
import { ManualClock } from '../../../src/services/tracking/clock.js';
import { InMemorySessionStore } from '../../../src/services/store/memory.js';
import { SqliteSessionStore, createDatabase } from '../../../src/services/store/sqlite.js';
import type { WorkDayAggregate } from '../../../src/types/index.js';
import { TrackingError } from '../../../src/utils/errors.js';
import { expectRejectsWith, sequentialIds } from '../../helpers.js';

/**
 * Store that yields to the event loop on every call, so unsynchronized
 * read-modify-write sequences would interleave
 */
class YieldingStore extends InMemorySessionStore {
  saves = 0;

  private yieldTurn(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 1));
  }

  override async load(ownerId: string): Promise<WorkDayAggregate | null> {
    await this.yieldTurn();
    return super.load(ownerId);
  }

  override async save(aggregate: WorkDayAggregate): Promise<void> {
    await this.yieldTurn();
    this.saves += 1;
    return super.save(aggregate);
  }
}

const standup = { title: 'Standup', meeting_type: 'standup' as const, attendee_count: 5 };

describe('TrackingEngine', () => {
  let store: YieldingStore;
  let clock: ManualClock;
  let engine: TrackingEngine;

  beforeEach(() => {
    store = new YieldingStore();
    clock = new ManualClock('2026-01-05T09:00:00.000Z');
    engine = new TrackingEngine({ store, clock, generateId: sequentialIds() });
  });

  it('reports a full day: one-minute meeting plus a 90 minute entry', async () => {
    await engine.startWorkDay('alice', 'planning');
    const meeting = await engine.startMeeting('alice', standup);
    clock.advanceMinutes(1);
    const stopped = await engine.stopMeeting('alice', meeting.id);
    expect(stopped.duration_minutes).toBe(1);

    await engine.addEntry('alice', { description: 'Fix bug', duration_minutes: 90 });
    await engine.stopWorkDay('alice');

    const report = await engine.report('alice');
    expect(report.meeting_minutes).toBe(1);
    expect(report.entry_minutes).toBe(90);
    expect(report.total_minutes).toBe(91);
    expect(report.meeting_count).toBe(1);
  });

  describe('work day', () => {
    it('starts and records the clock time', async () => {
      const day = await engine.startWorkDay('alice', 'planning');
      expect(day).toMatchObject({
        id: 'id-1',
        owner_id: 'alice',
        status: 'active',
        started_at: '2026-01-05T09:00:00.000Z',
        initial_activity: 'planning',
      });
    });

    it('fails a second start with conflict and leaves state unchanged', async () => {
      await engine.startWorkDay('alice');
      const before = await store.list('alice');
      const savesBefore = store.saves;

      await expectRejectsWith(engine.startWorkDay('alice'), 'conflict');

      expect(await store.list('alice')).toEqual(before);
      expect(store.saves).toBe(savesBefore);
    });

    it('lets only one of two concurrent starts succeed', async () => {
      const results = await Promise.allSettled([
        engine.startWorkDay('alice'),
        engine.startWorkDay('alice'),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(rejected).toHaveLength(1);
      expect(rejected[0] instanceof TrackingError && rejected[0].kind).toBe('conflict');
      expect(await store.list('alice')).toHaveLength(1);
    });

    it('tracks owners independently', async () => {
      await engine.startWorkDay('alice');
      await engine.startWorkDay('bob');
      expect((await engine.getStatus('alice')).work_day?.status).toBe('active');
      expect((await engine.getStatus('bob')).work_day?.status).toBe('active');
    });

    it('stop with no work day fails with not_found and is safe to retry', async () => {
      await expectRejectsWith(engine.stopWorkDay('alice'), 'not_found');
      await expectRejectsWith(engine.stopWorkDay('alice'), 'not_found');
      expect(store.saves).toBe(0);
      expect(await store.list('alice')).toEqual([]);
    });

    it('stop after the day ended fails with invalid_state', async () => {
      await engine.startWorkDay('alice');
      await engine.stopWorkDay('alice');
      await expectRejectsWith(engine.stopWorkDay('alice'), 'invalid_state');
    });

    it('starts a new day after the previous one ended', async () => {
      const first = await engine.startWorkDay('alice');
      clock.advanceMinutes(60);
      await engine.stopWorkDay('alice');
      const second = await engine.startWorkDay('alice');

      expect(second.id).not.toBe(first.id);
      const days = await store.list('alice');
      expect(days.map((d) => d.work_day.status)).toEqual(['ended', 'active']);
    });

    it('starts a prepared day', async () => {
      const prepared = await engine.prepareWorkDay('alice', 'inbox');
      clock.advanceMinutes(30);
      const started = await engine.startWorkDay('alice');
      expect(started.id).toBe(prepared.id);
      expect(started.started_at).toBe('2026-01-05T09:30:00.000Z');
      expect(started.current_activity).toBe('inbox');
    });

    it('force-stops a running meeting at the work day end time', async () => {
      await engine.startWorkDay('alice');
      const meeting = await engine.startMeeting('alice', standup);
      clock.advanceMinutes(20);
      const ended = await engine.stopWorkDay('alice');

      const [stored] = await engine.listMeetings('alice');
      expect(stored?.id).toBe(meeting.id);
      expect(stored?.status).toBe('stopped');
      expect(stored?.stopped_at).toBe(ended.ended_at);
      expect(stored?.duration_minutes).toBe(20);
    });

    it('updates the current activity', async () => {
      await engine.startWorkDay('alice', 'planning');
      const day = await engine.setActivity('alice', 'reviewing PRs');
      expect(day.current_activity).toBe('reviewing PRs');
      expect((await engine.getStatus('alice')).work_day?.current_activity).toBe('reviewing PRs');
    });
  });

  describe('meetings', () => {
    beforeEach(async () => {
      await engine.startWorkDay('alice');
    });

    it('lets exactly one of two concurrent meeting starts succeed', async () => {
      const results = await Promise.allSettled([
        engine.startMeeting('alice', standup),
        engine.startMeeting('alice', { ...standup, title: 'Review' }),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(TrackingError);
      expect(rejected[0] instanceof TrackingError && rejected[0].kind).toBe('conflict');

      const meetings = await engine.listMeetings('alice');
      expect(meetings.filter((m) => m.status === 'running')).toHaveLength(1);
    });

    it('requires an active work day', async () => {
      await engine.stopWorkDay('alice');
      await expectRejectsWith(engine.startMeeting('alice', standup), 'not_found');
      await expectRejectsWith(engine.startMeeting('bob', standup), 'not_found');
    });

    it('rejects a negative attendee count with validation', async () => {
      await expectRejectsWith(engine.startMeeting('alice', { ...standup, attendee_count: -2 }), 'validation');
      expect(await engine.listMeetings('alice')).toEqual([]);
    });

    it('stopping twice fails with invalid_state', async () => {
      const meeting = await engine.startMeeting('alice', standup);
      await engine.stopMeeting('alice', meeting.id);
      await expectRejectsWith(engine.stopMeeting('alice', meeting.id), 'invalid_state');
    });

    it('stopping an unknown meeting fails with not_found', async () => {
      await expectRejectsWith(engine.stopMeeting('alice', 'missing'), 'not_found');
    });

    it('lists meetings in start order', async () => {
      const first = await engine.startMeeting('alice', standup);
      clock.advanceMinutes(15);
      await engine.stopMeeting('alice', first.id);
      clock.advanceMinutes(5);
      const second = await engine.startMeeting('alice', { ...standup, title: 'Planning', meeting_type: 'planning' });

      const meetings = await engine.listMeetings('alice');
      expect(meetings.map((m) => m.id)).toEqual([first.id, second.id]);
      expect(meetings.map((m) => m.duration_minutes)).toEqual([15, null]);
    });
  });

  describe('entries', () => {
    it('attaches to the active day', async () => {
      const day = await engine.startWorkDay('alice');
      const entry = await engine.addEntry('alice', {
        description: 'Fix bug',
        duration_minutes: 90,
        tags: ['backend'],
        commit_hash: 'abc1234',
      });
      expect(entry.work_day_id).toBe(day.id);
      expect(entry.commit_hash).toBe('abc1234');
    });

    it('fails with not_found when nothing is active and no day is named', async () => {
      await expectRejectsWith(engine.addEntry('alice', { description: 'x', duration_minutes: 5 }), 'not_found');
    });

    it.each([0, -30])('rejects duration %s with validation and stores nothing', async (minutes) => {
      await engine.startWorkDay('alice');
      await expectRejectsWith(
        engine.addEntry('alice', { description: 'x', duration_minutes: minutes }),
        'validation'
      );
      expect((await engine.report('alice')).entry_count).toBe(0);
    });

    it('backfills an ended day by id', async () => {
      const first = await engine.startWorkDay('alice');
      await engine.stopWorkDay('alice');
      await engine.startWorkDay('alice');

      const entry = await engine.addEntry('alice', {
        work_day_id: first.id,
        description: 'Forgot to log',
        duration_minutes: 25,
      });

      expect(entry.work_day_id).toBe(first.id);
      expect((await engine.report('alice', first.id)).entry_minutes).toBe(25);
      expect((await engine.report('alice')).entry_minutes).toBe(0);
    });

    it('fails with not_found for an unknown day id', async () => {
      await engine.startWorkDay('alice');
      await expectRejectsWith(
        engine.addEntry('alice', { work_day_id: 'nope', description: 'x', duration_minutes: 5 }),
        'not_found'
      );
    });

    it('keeps every entry when many are added concurrently', async () => {
      await engine.startWorkDay('alice');
      await Promise.all(
        [10, 20, 30, 40].map((minutes) =>
          engine.addEntry('alice', { description: `task ${minutes}`, duration_minutes: minutes })
        )
      );
      const report = await engine.report('alice');
      expect(report.entry_count).toBe(4);
      expect(report.entry_minutes).toBe(100);
    });
  });

  describe('status and reports', () => {
    it('returns an empty status for an unknown owner', async () => {
      expect(await engine.getStatus('nobody')).toEqual({
        work_day: null,
        running_meeting: null,
        elapsed_minutes: null,
        total_minutes: 0,
        entry_count: 0,
      });
    });

    it('totals what has been logged on the latest day', async () => {
      await engine.startWorkDay('alice');
      const meeting = await engine.startMeeting('alice', standup);
      clock.advanceMinutes(15);
      await engine.stopMeeting('alice', meeting.id);
      await engine.startMeeting('alice', standup);
      await engine.addEntry('alice', { description: 'Fix bug', duration_minutes: 45, entry_type: 'debugging' });

      const status = await engine.getStatus('alice');
      expect(status.total_minutes).toBe(60);
      expect(status.entry_count).toBe(1);
    });

    it('returns the final report of the day it stops', async () => {
      await engine.startWorkDay('alice');
      await engine.startMeeting('alice', standup);
      await engine.addEntry('alice', { description: 'Review', duration_minutes: 20 });
      clock.advanceMinutes(10);

      const { work_day, report } = await engine.stopWorkDayWithReport('alice');
      expect(work_day.status).toBe('ended');
      expect(report.work_day).toEqual(work_day);
      expect(report.meeting_minutes).toBe(10);
      expect(report.total_formatted).toBe('30m');
    });

    it('computes elapsed minutes from the recorded start', async () => {
      await engine.startWorkDay('alice');
      const meeting = await engine.startMeeting('alice', standup);
      clock.advanceSeconds(125);

      const status = await engine.getStatus('alice');
      expect(status.elapsed_minutes).toBe(2);
      expect(status.running_meeting?.id).toBe(meeting.id);
    });

    it('has no elapsed time once the day ended', async () => {
      await engine.startWorkDay('alice');
      await engine.stopWorkDay('alice');
      expect((await engine.getStatus('alice')).elapsed_minutes).toBeNull();
    });

    it('ignores a running meeting until it stops', async () => {
      await engine.startWorkDay('alice');
      const meeting = await engine.startMeeting('alice', standup);
      clock.advanceMinutes(30);
      expect((await engine.report('alice')).meeting_minutes).toBe(0);

      await engine.stopMeeting('alice', meeting.id);
      expect((await engine.report('alice')).meeting_minutes).toBe(30);
    });

    it('returns identical reports without intervening changes', async () => {
      await engine.startWorkDay('alice');
      await engine.addEntry('alice', { description: 'Docs', duration_minutes: 15, tags: ['docs'] });
      expect(await engine.report('alice')).toEqual(await engine.report('alice'));
    });

    it('fails with not_found when there is nothing to report', async () => {
      await expectRejectsWith(engine.report('alice'), 'not_found');
      await expectRejectsWith(engine.report('alice', 'day-x'), 'not_found');
    });

    it('reports a date range across days', async () => {
      await engine.startWorkDay('alice');
      await engine.addEntry('alice', { description: 'Mon', duration_minutes: 60 });
      await engine.stopWorkDay('alice');

      clock.set('2026-01-06T09:00:00.000Z');
      await engine.startWorkDay('alice');
      await engine.addEntry('alice', { description: 'Tue', duration_minutes: 30 });

      const range = await engine.reportRange('alice', '2026-01-05', '2026-01-06');
      expect(range.work_day_count).toBe(2);
      expect(range.entry_minutes).toBe(90);

      const mondayOnly = await engine.reportRange('alice', '2026-01-05', '2026-01-05');
      expect(mondayOnly.entry_minutes).toBe(60);
    });
  });
});

describe('TrackingEngine over SQLite', () => {
  it('keeps a single active day when the clock steps back between days', async () => {
    const store = new SqliteSessionStore(createDatabase(':memory:'));
    const clock = new ManualClock('2026-01-05T09:00:00.000Z');
    const engine = new TrackingEngine({ store, clock, generateId: sequentialIds('day') });

    await engine.startWorkDay('alice');
    await engine.stopWorkDay('alice');
    clock.set('2026-01-05T08:59:00.000Z');
    const second = await engine.startWorkDay('alice');

    await expectRejectsWith(engine.startWorkDay('alice'), 'conflict');
    expect((await engine.getStatus('alice')).work_day?.id).toBe(second.id);

    const days = await store.list('alice');
    expect(days.filter((d) => d.work_day.status === 'active').map((d) => d.work_day.id)).toEqual([second.id]);
    await store.close();
  });
});

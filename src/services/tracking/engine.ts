/**
 * Tracking engine
 *
 * Ties the pure transitions to a session store. Each mutating call loads the
 * owner's aggregate, applies one transition and saves the result while holding
 * that owner's lock, so concurrent calls for the same owner never interleave.
 * A transition that throws is never saved.
 */

import { randomUUID } from 'crypto';
import type {
  AddEntryInput,
  Meeting,
  RangeReport,
  Report,
  StartMeetingInput,
  TimeEntry,
  TrackingStatus,
  WorkDay,
  WorkDayAggregate,
} from '../../types/tracking.js';
import { notFound } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { SessionStore } from '../store/types.js';
import { buildRangeReport, buildReport } from './aggregator.js';
import { systemClock, type Clock } from './clock.js';
import { elapsedMinutes, formatDuration } from './duration.js';
import { appendEntry, resolveEntryTarget } from './ledger.js';
import { OwnerLock } from './owner-lock.js';
import * as machine from './state-machine.js';

export interface TrackingEngineOptions {
  store: SessionStore;
  clock?: Clock | undefined;
  generateId?: (() => string) | undefined;
}

export class TrackingEngine {
  private readonly store: SessionStore;
  private readonly clock: Clock;
  private readonly generateId: () => string;
  private readonly lock = new OwnerLock();

  constructor(options: TrackingEngineOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  private now(): string {
    return this.clock.now().toISOString();
  }

  /**
   * Load, transform and save one owner's latest aggregate under the owner lock
   */
  private mutate<T>(
    ownerId: string,
    transition: (latest: WorkDayAggregate | null, now: string) => { aggregate: WorkDayAggregate; result: T }
  ): Promise<T> {
    return this.lock.run(ownerId, async () => {
      const latest = await this.store.load(ownerId);
      const { aggregate, result } = transition(latest, this.now());
      await this.store.save(aggregate);
      return result;
    });
  }

  async prepareWorkDay(ownerId: string, initialActivity?: string): Promise<WorkDay> {
    const workDay = await this.mutate(ownerId, (latest, now) => {
      const aggregate = machine.prepareWorkDay(latest, ownerId, this.generateId(), now, initialActivity);
      return { aggregate, result: { ...aggregate.work_day } };
    });
    logger.info(`Prepared work day ${workDay.id} for ${ownerId}`);
    return workDay;
  }

  async startWorkDay(ownerId: string, initialActivity?: string): Promise<WorkDay> {
    const workDay = await this.mutate(ownerId, (latest, now) => {
      const aggregate = machine.startWorkDay(latest, ownerId, this.generateId(), now, initialActivity);
      return { aggregate, result: { ...aggregate.work_day } };
    });
    logger.info(`Started work day ${workDay.id} for ${ownerId}`);
    return workDay;
  }

  async stopWorkDay(ownerId: string): Promise<WorkDay> {
    const { work_day } = await this.stopWorkDayWithReport(ownerId);
    return work_day;
  }

  /**
   * End the active work day and return its final report, built from the
   * aggregate that was saved
   */
  async stopWorkDayWithReport(ownerId: string): Promise<{ work_day: WorkDay; report: Report }> {
    const { workDay, report, forcedStops } = await this.mutate(ownerId, (latest, now) => {
      const running = latest ? machine.findRunningMeeting(latest) : null;
      const aggregate = machine.stopWorkDay(latest, now);
      return {
        aggregate,
        result: {
          workDay: { ...aggregate.work_day },
          report: buildReport(aggregate),
          forcedStops: running ? [running.id] : [],
        },
      };
    });
    for (const meetingId of forcedStops) {
      logger.info(`Meeting ${meetingId} stopped with work day ${workDay.id}`);
    }
    logger.info(`Ended work day ${workDay.id} for ${ownerId}: ${report.total_formatted}`);
    return { work_day: workDay, report };
  }

  async setActivity(ownerId: string, activity: string): Promise<WorkDay> {
    return this.mutate(ownerId, (latest) => {
      const aggregate = machine.setActivity(latest, activity);
      return { aggregate, result: { ...aggregate.work_day } };
    });
  }

  async startMeeting(ownerId: string, input: StartMeetingInput): Promise<Meeting> {
    const meeting = await this.mutate(ownerId, (latest, now) => {
      const { aggregate, meeting } = machine.startMeeting(latest, this.generateId(), now, input);
      return { aggregate, result: meeting };
    });
    logger.info(`Started meeting "${meeting.title}" (${meeting.id}) for ${ownerId}`);
    return meeting;
  }

  async stopMeeting(ownerId: string, meetingId: string): Promise<Meeting> {
    const meeting = await this.mutate(ownerId, (latest, now) => {
      const { aggregate, meeting } = machine.stopMeeting(latest, meetingId, now);
      return { aggregate, result: meeting };
    });
    logger.info(`Stopped meeting ${meeting.id} after ${formatDuration(meeting.duration_minutes ?? 0)}`);
    return meeting;
  }

  /**
   * Append a time entry to the active work day, or to a named one
   */
  async addEntry(ownerId: string, input: AddEntryInput): Promise<TimeEntry> {
    const entry = await this.lock.run(ownerId, async () => {
      const latest = await this.store.load(ownerId);
      let byId: WorkDayAggregate | null = null;
      if (input.work_day_id !== undefined) {
        byId =
          latest?.work_day.id === input.work_day_id
            ? latest
            : await this.store.loadById(ownerId, input.work_day_id);
      }

      const target = resolveEntryTarget(latest, byId, input.work_day_id);
      const { aggregate, entry } = appendEntry(target, this.generateId(), this.now(), input);
      await this.store.save(aggregate);
      return entry;
    });
    logger.info(`Logged ${formatDuration(entry.duration_minutes)} on work day ${entry.work_day_id}`);
    return entry;
  }

  /**
   * Snapshot of the owner's latest work day, its running meeting and the time logged on it
   */
  async getStatus(ownerId: string): Promise<TrackingStatus> {
    const latest = await this.store.load(ownerId);
    if (!latest) {
      return { work_day: null, running_meeting: null, elapsed_minutes: null, total_minutes: 0, entry_count: 0 };
    }

    const { work_day } = latest;
    const totals = buildReport(latest);
    return {
      work_day,
      running_meeting: machine.findRunningMeeting(latest),
      elapsed_minutes:
        work_day.status === 'active' && work_day.started_at
          ? elapsedMinutes(work_day.started_at, this.clock.now())
          : null,
      total_minutes: totals.total_minutes,
      entry_count: totals.entry_count,
    };
  }

  async listMeetings(ownerId: string, workDayId?: string): Promise<Meeting[]> {
    const { meetings } = await this.loadForRead(ownerId, workDayId);
    return meetings.sort((a, b) => Date.parse(a.started_at) - Date.parse(b.started_at));
  }

  /**
   * Report for the latest work day, or a named one
   */
  async report(ownerId: string, workDayId?: string): Promise<Report> {
    return buildReport(await this.loadForRead(ownerId, workDayId));
  }

  async reportRange(ownerId: string, from: string, to: string): Promise<RangeReport> {
    return buildRangeReport(ownerId, from, to, await this.store.list(ownerId));
  }

  private async loadForRead(ownerId: string, workDayId?: string): Promise<WorkDayAggregate> {
    const aggregate =
      workDayId === undefined
        ? await this.store.load(ownerId)
        : await this.store.loadById(ownerId, workDayId);
    if (!aggregate) {
      throw notFound(workDayId === undefined ? 'No work day found' : `Work day not found: ${workDayId}`);
    }
    return aggregate;
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

/**
 * Work day, meeting and time entry tracking
 */

export { TrackingEngine } from './engine.js';
export type { TrackingEngineOptions } from './engine.js';
export { systemClock, ManualClock } from './clock.js';
export type { Clock } from './clock.js';
export { OwnerLock } from './owner-lock.js';
export { buildReport, buildRangeReport, workDayDate, NO_PROJECT } from './aggregator.js';
export { parseDuration, formatDuration, meetingDurationMinutes, elapsedMinutes } from './duration.js';
export { getTrackingEngine, setTrackingEngine, resetTrackingEngine } from './context.js';

/**
 * Process-wide tracking engine, built from configuration on first use
 */

import { getConfig } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { InMemorySessionStore } from '../store/memory.js';
import { SqliteSessionStore } from '../store/sqlite.js';
import type { SessionStore } from '../store/types.js';
import { TrackingEngine } from './engine.js';

let engineInstance: TrackingEngine | null = null;

function createStore(): SessionStore {
  const config = getConfig();
  if (config.store === 'memory') {
    logger.warn('Using in-memory session store; tracking data is lost on exit');
    return new InMemorySessionStore();
  }
  return SqliteSessionStore.open(config.dbPath);
}

/**
 * Get the tracking engine (created on first call)
 */
export function getTrackingEngine(): TrackingEngine {
  if (!engineInstance) {
    engineInstance = new TrackingEngine({ store: createStore() });
  }
  return engineInstance;
}

/**
 * Replace the tracking engine (for testing or embedding)
 */
export function setTrackingEngine(engine: TrackingEngine): void {
  engineInstance = engine;
}

/**
 * Close and forget the current engine
 */
export async function resetTrackingEngine(): Promise<void> {
  const engine = engineInstance;
  engineInstance = null;
  if (engine) {
    await engine.close();
  }
}

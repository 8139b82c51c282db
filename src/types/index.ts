/**
 * Worklog Tracker - Type Definitions
 */

import type { LogLevel } from '../utils/logger.js';

export * from './tracking.js';

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;

// Configuration
export type StoreKind = 'sqlite' | 'memory';

export interface HttpSettings {
  enabled: boolean;
  port: number;
  corsOrigin: string;
}

export interface WorklogConfig {
  configPath: string | null; // config file actually read, if any
  store: StoreKind;
  dbPath: string;
  owner: string;
  logLevel: LogLevel;
  http: HttpSettings;
}

/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';

// Import tool handlers
import {
  dayPrepareTool,
  dayPrepareHandler,
  dayStartTool,
  dayStartHandler,
  dayStopTool,
  dayStopHandler,
  statusTool,
  statusHandler,
  activityTool,
  activityHandler,
} from './day.js';
import {
  meetingStartTool,
  meetingStartHandler,
  meetingStopTool,
  meetingStopHandler,
  meetingsTool,
  meetingsHandler,
} from './meeting.js';
import { entryAddTool, entryAddHandler } from './entry.js';
import { reportTool, reportHandler } from './report.js';

type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

function register(tool: Tool, handler: ToolHandler): void {
  tools.set(tool.name, tool);
  handlers.set(tool.name, handler);
}

/**
 * Register all tools
 */
export function registerTools(): void {
  // Work day lifecycle
  register(dayPrepareTool, dayPrepareHandler);
  register(dayStartTool, dayStartHandler);
  register(dayStopTool, dayStopHandler);
  register(statusTool, statusHandler);
  register(activityTool, activityHandler);

  // Meeting timers
  register(meetingStartTool, meetingStartHandler);
  register(meetingStopTool, meetingStopHandler);
  register(meetingsTool, meetingsHandler);

  // Ledger and reports
  register(entryAddTool, entryAddHandler);
  register(reportTool, reportHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args);
}

/**
 * Work day tools - worklog_day_prepare, worklog_day_start, worklog_day_stop,
 * worklog_status, worklog_activity
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult, TrackingStatus, WorkDay } from '../types/index.js';
import { getTrackingEngine } from '../services/tracking/context.js';
import { formatDuration } from '../services/tracking/duration.js';
import {
  failure,
  ownerJsonSchema,
  ownerParamSchema,
  resolveOwnerParam,
  validationFailure,
} from '../utils/owner-param.js';

const startInputSchema = ownerParamSchema.extend({
  initial_activity: z.string().optional(),
});

const ownerOnlySchema = ownerParamSchema;

const activityInputSchema = ownerParamSchema.extend({
  activity: z.string().min(1, 'Activity is required'),
});

export const dayPrepareTool: Tool = {
  name: 'worklog_day_prepare',
  description:
    'Create a work day that has not started yet. Use worklog_day_start to begin tracking it.',
  inputSchema: {
    type: 'object',
    properties: {
      initial_activity: {
        type: 'string',
        description: 'What the day will start with',
      },
      owner: ownerJsonSchema,
    },
  },
};

export const dayStartTool: Tool = {
  name: 'worklog_day_start',
  description:
    'Start tracking the work day. Fails with CONFLICT if a work day is already active; an ended day is never reopened, a new one is created.',
  inputSchema: {
    type: 'object',
    properties: {
      initial_activity: {
        type: 'string',
        description: 'What you are starting with',
      },
      owner: ownerJsonSchema,
    },
  },
};

export const dayStopTool: Tool = {
  name: 'worklog_day_stop',
  description:
    'End the active work day. A meeting that is still running is stopped at the same time.',
  inputSchema: {
    type: 'object',
    properties: {
      owner: ownerJsonSchema,
    },
  },
};

export const statusTool: Tool = {
  name: 'worklog_status',
  description:
    'Show the current work day, the running meeting if any, minutes elapsed, and the time and entry count logged on it.',
  inputSchema: {
    type: 'object',
    properties: {
      owner: ownerJsonSchema,
    },
  },
};

export const activityTool: Tool = {
  name: 'worklog_activity',
  description: 'Update what you are currently working on during the active work day.',
  inputSchema: {
    type: 'object',
    properties: {
      activity: {
        type: 'string',
        description: 'Current activity',
      },
      owner: ownerJsonSchema,
    },
    required: ['activity'],
  },
};

export async function dayPrepareHandler(args: Record<string, unknown>): Promise<ToolResult<WorkDay>> {
  const parseResult = startInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  try {
    const workDay = await getTrackingEngine().prepareWorkDay(
      resolveOwnerParam(input.owner),
      input.initial_activity
    );
    return { success: true, data: workDay };
  } catch (error) {
    return failure(error, 'DAY_PREPARE_ERROR');
  }
}

export async function dayStartHandler(
  args: Record<string, unknown>
): Promise<ToolResult<{ work_day: WorkDay; message: string }>> {
  const parseResult = startInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  try {
    const workDay = await getTrackingEngine().startWorkDay(
      resolveOwnerParam(input.owner),
      input.initial_activity
    );
    return {
      success: true,
      data: { work_day: workDay, message: `Work day started at ${workDay.started_at}` },
    };
  } catch (error) {
    return failure(error, 'DAY_START_ERROR');
  }
}

export async function dayStopHandler(
  args: Record<string, unknown>
): Promise<ToolResult<{ work_day: WorkDay; total_formatted: string; message: string }>> {
  const parseResult = ownerOnlySchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const owner = resolveOwnerParam(parseResult.data.owner);
  try {
    const { work_day, report } = await getTrackingEngine().stopWorkDayWithReport(owner);
    return {
      success: true,
      data: {
        work_day,
        total_formatted: report.total_formatted,
        message: `Work day ended: ${report.total_formatted} tracked`,
      },
    };
  } catch (error) {
    return failure(error, 'DAY_STOP_ERROR');
  }
}

export async function statusHandler(
  args: Record<string, unknown>
): Promise<ToolResult<TrackingStatus & { elapsed_formatted: string | null; total_formatted: string }>> {
  const parseResult = ownerOnlySchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  try {
    const status = await getTrackingEngine().getStatus(resolveOwnerParam(parseResult.data.owner));
    return {
      success: true,
      data: {
        ...status,
        elapsed_formatted:
          status.elapsed_minutes === null ? null : formatDuration(status.elapsed_minutes),
        total_formatted: formatDuration(status.total_minutes),
      },
    };
  } catch (error) {
    return failure(error, 'STATUS_ERROR');
  }
}

export async function activityHandler(args: Record<string, unknown>): Promise<ToolResult<WorkDay>> {
  const parseResult = activityInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  try {
    const workDay = await getTrackingEngine().setActivity(resolveOwnerParam(input.owner), input.activity);
    return { success: true, data: workDay };
  } catch (error) {
    return failure(error, 'ACTIVITY_ERROR');
  }
}

/**
 * Meeting timer tools - worklog_meeting_start, worklog_meeting_stop, worklog_meetings
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Meeting, ToolResult } from '../types/index.js';
import { MEETING_TYPES } from '../types/index.js';
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
  title: z.string().min(1, 'Title is required').max(200),
  meeting_type: z.enum(MEETING_TYPES).optional().default('other'),
  attendee_count: z.number().int().nonnegative().optional().default(1),
  description: z.string().optional(),
});

const stopInputSchema = ownerParamSchema.extend({
  meeting_id: z.string().min(1, 'Meeting id is required'),
});

const listInputSchema = ownerParamSchema.extend({
  work_day_id: z.string().optional(),
});

export const meetingStartTool: Tool = {
  name: 'worklog_meeting_start',
  description:
    'Start a meeting timer within the active work day. Only one meeting can run at a time.',
  inputSchema: {
    type: 'object',
    properties: {
      title: {
        type: 'string',
        description: 'Meeting title',
      },
      meeting_type: {
        type: 'string',
        description: 'Kind of meeting (default: other)',
        enum: [...MEETING_TYPES],
      },
      attendee_count: {
        type: 'number',
        description: 'Number of attendees (default: 1)',
      },
      description: {
        type: 'string',
        description: 'Agenda or notes',
      },
      owner: ownerJsonSchema,
    },
    required: ['title'],
  },
};

export const meetingStopTool: Tool = {
  name: 'worklog_meeting_stop',
  description:
    'Stop a running meeting. Duration is rounded up to whole minutes, at least 1.',
  inputSchema: {
    type: 'object',
    properties: {
      meeting_id: {
        type: 'string',
        description: 'Id returned by worklog_meeting_start',
      },
      owner: ownerJsonSchema,
    },
    required: ['meeting_id'],
  },
};

export const meetingsTool: Tool = {
  name: 'worklog_meetings',
  description: 'List the meetings of the current (or a given) work day in start order.',
  inputSchema: {
    type: 'object',
    properties: {
      work_day_id: {
        type: 'string',
        description: 'Work day id (defaults to the latest work day)',
      },
      owner: ownerJsonSchema,
    },
  },
};

export async function meetingStartHandler(args: Record<string, unknown>): Promise<ToolResult<Meeting>> {
  const parseResult = startInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  try {
    const meeting = await getTrackingEngine().startMeeting(resolveOwnerParam(input.owner), {
      title: input.title,
      meeting_type: input.meeting_type,
      attendee_count: input.attendee_count,
      description: input.description,
    });
    return { success: true, data: meeting };
  } catch (error) {
    return failure(error, 'MEETING_START_ERROR');
  }
}

export async function meetingStopHandler(
  args: Record<string, unknown>
): Promise<ToolResult<Meeting & { duration_formatted: string }>> {
  const parseResult = stopInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  try {
    const meeting = await getTrackingEngine().stopMeeting(resolveOwnerParam(input.owner), input.meeting_id);
    return {
      success: true,
      data: { ...meeting, duration_formatted: formatDuration(meeting.duration_minutes ?? 0) },
    };
  } catch (error) {
    return failure(error, 'MEETING_STOP_ERROR');
  }
}

export async function meetingsHandler(
  args: Record<string, unknown>
): Promise<ToolResult<{ meetings: Meeting[]; count: number }>> {
  const parseResult = listInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  try {
    const meetings = await getTrackingEngine().listMeetings(
      resolveOwnerParam(input.owner),
      input.work_day_id
    );
    return { success: true, data: { meetings, count: meetings.length } };
  } catch (error) {
    return failure(error, 'MEETINGS_ERROR');
  }
}

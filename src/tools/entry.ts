/**
 * worklog_entry_add tool
 *
 * Manually log time against the active work day, or backfill a past one.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { TimeEntry, ToolResult } from '../types/index.js';
import { ENTRY_TYPES } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { getTrackingEngine } from '../services/tracking/context.js';
import { formatDuration, parseDuration } from '../services/tracking/duration.js';
import {
  failure,
  ownerJsonSchema,
  ownerParamSchema,
  resolveOwnerParam,
  validationFailure,
} from '../utils/owner-param.js';

const inputSchema = ownerParamSchema.extend({
  description: z.string().min(1, 'Description is required'),
  duration: z
    .union([z.string(), z.number()])
    .describe('Duration: minutes (90), hours (2h, 1.5h), or hours+minutes (1h 30m)'),
  entry_type: z.enum(ENTRY_TYPES).optional().default('work'),
  work_day_id: z.string().optional(),
  commit_hash: z.string().optional(),
  jira_ticket: z.string().optional(),
  project: z.string().optional(),
  billable: z.boolean().optional().default(true),
  tags: z.array(z.string()).optional(),
});

export const entryAddTool: Tool = {
  name: 'worklog_entry_add',
  description: `Log time spent on completed work. Attaches to the active work day unless work_day_id is given, in which case it may backfill an ended day. Supports flexible duration formats (90, "1.5h", "1h 30m").`,
  inputSchema: {
    type: 'object',
    properties: {
      description: {
        type: 'string',
        description: 'What was worked on',
      },
      duration: {
        oneOf: [{ type: 'string' }, { type: 'number' }],
        description: 'Duration: minutes (90), hours ("2h", "1.5h"), or hours+minutes ("1h 30m")',
      },
      entry_type: {
        type: 'string',
        description: 'Kind of work (default: work)',
        enum: [...ENTRY_TYPES],
      },
      work_day_id: {
        type: 'string',
        description: 'Work day to log against (defaults to the active one)',
      },
      commit_hash: {
        type: 'string',
        description: 'Related commit',
      },
      jira_ticket: {
        type: 'string',
        description: 'Related ticket key, e.g. PROJ-123',
      },
      project: {
        type: 'string',
        description: 'Project name',
      },
      billable: {
        type: 'boolean',
        description: 'Whether this time is billable (default: true)',
      },
      tags: {
        type: 'array',
        items: { type: 'string' },
        description: 'Categories; an entry counts in full under each of its tags',
      },
      owner: ownerJsonSchema,
    },
    required: ['description', 'duration'],
  },
};

export async function entryAddHandler(
  args: Record<string, unknown>
): Promise<ToolResult<TimeEntry & { duration_formatted: string; message: string }>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const entry = await getTrackingEngine().addEntry(resolveOwnerParam(input.owner), {
      work_day_id: input.work_day_id,
      description: input.description,
      entry_type: input.entry_type,
      duration_minutes: parseDuration(input.duration),
      commit_hash: input.commit_hash,
      jira_ticket: input.jira_ticket,
      project: input.project,
      billable: input.billable,
      tags: input.tags,
    });

    const formatted = formatDuration(entry.duration_minutes);
    logger.debug(`Entry ${entry.id}: ${formatted} "${entry.description}"`);

    return {
      success: true,
      data: {
        ...entry,
        duration_formatted: formatted,
        message: `Logged ${formatted} for "${entry.description}"`,
      },
    };
  } catch (error) {
    return failure(error, 'ENTRY_ADD_ERROR');
  }
}

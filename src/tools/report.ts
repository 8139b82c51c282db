/**
 * worklog_report tool
 *
 * Aggregated report for one work day or a date range, as structured data or
 * rendered by one of the exporters.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { RangeReport, Report, ToolResult } from '../types/index.js';
import { getTrackingEngine } from '../services/tracking/context.js';
import { getExporter, listExportFormats } from '../services/export/index.js';
import {
  failure,
  ownerJsonSchema,
  ownerParamSchema,
  resolveOwnerParam,
  validationFailure,
} from '../utils/owner-param.js';

const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD');

const inputSchema = ownerParamSchema
  .extend({
    work_day_id: z.string().optional(),
    from: dateSchema.optional(),
    to: dateSchema.optional(),
    format: z.string().optional().default('json'),
  })
  .refine((v) => !(v.work_day_id && (v.from || v.to)), {
    message: 'Use either work_day_id or a from/to range, not both',
  })
  .refine((v) => !(v.to && !v.from), {
    message: 'from is required when to is given',
    path: ['from'],
  });

export interface RenderedReport {
  format: string;
  content_type: string;
  content: string;
}

export const reportTool: Tool = {
  name: 'worklog_report',
  description: `Report time for the latest work day, a specific work day, or every work day between two dates. Totals add meeting time and logged entries; running meetings count once stopped. Formats: json (structured), markdown, csv.`,
  inputSchema: {
    type: 'object',
    properties: {
      work_day_id: {
        type: 'string',
        description: 'Work day to report (defaults to the latest)',
      },
      from: {
        type: 'string',
        description: 'Range start, YYYY-MM-DD (inclusive)',
      },
      to: {
        type: 'string',
        description: 'Range end, YYYY-MM-DD (inclusive, defaults to from)',
      },
      format: {
        type: 'string',
        description: 'Output format (default: json)',
        enum: ['json', 'markdown', 'csv'],
      },
      owner: ownerJsonSchema,
    },
  },
};

export async function reportHandler(
  args: Record<string, unknown>
): Promise<ToolResult<Report | RangeReport | RenderedReport>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;
  const exporter = input.format === 'json' ? undefined : getExporter(input.format);
  if (input.format !== 'json' && !exporter) {
    return {
      success: false,
      error: `Unknown format: ${input.format}. Available: ${listExportFormats().join(', ')}`,
      code: 'VALIDATION_ERROR',
    };
  }

  const owner = resolveOwnerParam(input.owner);

  try {
    const engine = getTrackingEngine();
    if (input.from) {
      const range = await engine.reportRange(owner, input.from, input.to ?? input.from);
      if (!exporter) return { success: true, data: range };
      return {
        success: true,
        data: {
          format: exporter.format,
          content_type: exporter.contentType,
          content: exporter.renderRange(range),
        },
      };
    }

    const report = await engine.report(owner, input.work_day_id);
    if (!exporter) return { success: true, data: report };
    return {
      success: true,
      data: {
        format: exporter.format,
        content_type: exporter.contentType,
        content: exporter.render(report),
      },
    };
  } catch (error) {
    return failure(error, 'REPORT_ERROR');
  }
}

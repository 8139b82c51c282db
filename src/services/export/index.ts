/**
 * Report exporters
 */

import type { RangeReport, Report } from '../../types/index.js';
import { csvExporter } from './csv.js';
import { markdownExporter } from './markdown.js';
import type { ExportAdapter } from './types.js';

export type { ExportAdapter } from './types.js';
export { csvExporter, escapeCsvField, CSV_COLUMNS } from './csv.js';
export { markdownExporter } from './markdown.js';

export const jsonExporter: ExportAdapter<string> = {
  format: 'json',
  contentType: 'application/json',
  render: (report: Report) => JSON.stringify(report, null, 2),
  renderRange: (report: RangeReport) => JSON.stringify(report, null, 2),
};

const exporters: Map<string, ExportAdapter<string>> = new Map();

function registerBuiltins(): void {
  for (const adapter of [jsonExporter, markdownExporter, csvExporter]) {
    exporters.set(adapter.format, adapter);
  }
}

/**
 * Register an additional text exporter, replacing any with the same format name
 */
export function registerExporter(adapter: ExportAdapter<string>): void {
  if (exporters.size === 0) registerBuiltins();
  exporters.set(adapter.format, adapter);
}

export function getExporter(format: string): ExportAdapter<string> | undefined {
  if (exporters.size === 0) registerBuiltins();
  return exporters.get(format);
}

export function listExportFormats(): string[] {
  if (exporters.size === 0) registerBuiltins();
  return Array.from(exporters.keys());
}

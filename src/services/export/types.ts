/**
 * Export adapter contract
 *
 * An adapter turns a computed report into a payload for some target
 * (a file, a chat message, a ticket worklog). The engine never calls one.
 */

import type { RangeReport, Report } from '../../types/index.js';

export interface ExportAdapter<TPayload = string> {
  /** Format name used to select the adapter */
  format: string;
  /** MIME type of the rendered payload */
  contentType: string;
  render(report: Report): TPayload;
  renderRange(report: RangeReport): TPayload;
}

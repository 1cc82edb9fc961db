import { ConfigurationError } from '../errors.js';
import { REPORT_FORMATS, type ReportFormat } from '../publisher/report-generator.js';

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

/** `all` expands to every format, in the order the files are written. */
export function parseFormats(value: string): ReportFormat[] {
  if (value === 'all') return [...REPORT_FORMATS];
  if (isReportFormat(value)) return [value];
  throw new ConfigurationError(`Invalid --format "${value}". Use html, markdown, json, rss or all.`);
}

export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`Invalid --limit "${value}". Use a positive integer.`);
  }
  return n;
}

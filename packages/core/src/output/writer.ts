import { writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export type ReportKind = 'verification' | 'consensus';
export type ReportFormat = 'markdown' | 'json';

export interface WriteReportOptions {
  outputDir: string;
  kind: ReportKind;
  format: ReportFormat;
  /** Already rendered report body. */
  content: string;
  /** Clock used for the filename timestamp. Defaults to now. */
  now?: Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local-time stamp in `YYYYMMDD_HHMMSS` form. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function getExtension(format: ReportFormat): string {
  switch (format) {
    case 'json': return '.json';
    case 'markdown': return '.md';
  }
}

export function resolveReportFilename(kind: ReportKind, format: ReportFormat, now: Date): string {
  return `${kind}_${formatTimestamp(now)}${getExtension(format)}`;
}

/** Write a rendered report to `<outputDir>/<kind>_<timestamp>.<ext>` and return the path. */
export function writeReport(options: WriteReportOptions): string {
  const { outputDir, kind, format, content } = options;

  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const path = join(outputDir, resolveReportFilename(kind, format, options.now ?? new Date()));
  writeFileSync(path, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
  return path;
}

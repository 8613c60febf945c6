export {
  type ReportKind,
  type ReportFormat,
  type WriteReportOptions,
  formatTimestamp,
  resolveReportFilename,
  writeReport,
} from './writer.js';

/**
 * @module output/index
 * @description Reconciliation report renderers
 * @status COMPLETE
 * @dependencies src/output/report.ts
 * @lastModified 2026-10-18
 */

export {
  type ReportFormat,
  type ReportInput,
  REPORT_FORMATS,
  buildJsonReport,
  formatTextReport,
  renderReport,
} from './report';

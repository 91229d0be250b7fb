/**
 * Render Report Tool
 */

export {
  renderReports,
  buildTargetContext,
  buildSummaryContext,
  reportableFindings,
  truncateDescription,
  targetReportFileName,
  inlineJson,
  SEVERITY_COLORS,
  SUMMARY_HTML,
  SUMMARY_JSON,
  type RenderReportsParams,
  type RenderReportsDeps,
  type ReportFiles,
} from './tool';

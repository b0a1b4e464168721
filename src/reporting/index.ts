export { reportingConfig } from './config.js';
export { runMonthlyReportCycle } from './monthly-report.js';
export type { MonthlyReportResult } from './monthly-report.js';

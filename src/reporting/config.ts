/**
 * Reporting Configuration
 *
 * Environment variables:
 * - REPORT_DAY_OF_MONTH: Day the previous month is closed (default: 1)
 * - REPORT_HOUR_UTC: Hour of that day, UTC (default: 8)
 * - REPORT_HOME_CURRENCY: Currency assumed when an invoice carries none (default: EUR)
 */

import { intEnv, optionalEnv } from '../config.js';

export interface ReportingConfig {
  dayOfMonth: number;
  hourUtc: number;
  homeCurrency: string;
}

export const reportingConfig: ReportingConfig = {
  dayOfMonth: Math.min(Math.max(intEnv('REPORT_DAY_OF_MONTH', 1), 1), 28),
  hourUtc: Math.min(Math.max(intEnv('REPORT_HOUR_UTC', 8), 0), 23),
  homeCurrency: optionalEnv('REPORT_HOME_CURRENCY', 'EUR').toUpperCase(),
};

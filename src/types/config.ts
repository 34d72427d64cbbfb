/**
 * Configuration types for the collector
 */
import type { AppType } from './constants.js';

/**
 * One configured Servarr endpoint. Built once at startup and frozen.
 */
export interface InstanceConfig {
  readonly name: string;
  readonly url: string;
  readonly apiKey: string;
  readonly webhook?: string;
  readonly appType?: AppType; // Forced kind, skips detection
  readonly calendarDays: number;
  readonly calendarDaysBefore: number;
  readonly calendarOnly: boolean;
  readonly timezone?: string; // IANA zone name
  readonly verbose: boolean;
  readonly dryRun: boolean;
}

/**
 * How the collector repeats collection cycles
 */
export type RunSchedule =
  | { mode: 'once' }
  | { mode: 'interval'; seconds: number }
  | { mode: 'cron'; expression: string; timezone?: string };

/**
 * Options gathered from the command line
 */
export interface CliOptions {
  config?: string;
  url?: string;
  apiKey?: string;
  webhook?: string;
  type?: string;
  days: number;
  daysBefore: number;
  calendarOnly: boolean;
  timezone?: string;
  interval: number;
  schedule?: string;
  verbose: boolean;
  dryRun: boolean;
}

import { z } from 'zod';
import { CronExpressionParser } from 'cron-parser';
import { APP_TYPES, DEFAULT_CALENDAR_DAYS, DEFAULT_CALENDAR_DAYS_BEFORE, MAX_INTERVAL_SECONDS } from '../types/constants.js';
import { ConfigError, getErrorMessage } from '../utils/errorUtils.js';

/**
 * Throws a ConfigError carrying the parser's reason when the expression is invalid
 */
export function validateCronExpression(expression: string, timezone?: string): void {
  try {
    CronExpressionParser.parse(expression, timezone ? { tz: timezone } : {});
  } catch (error: unknown) {
    throw new ConfigError(`Invalid cron expression "${expression}": ${getErrorMessage(error)}`);
  }
}

const isValidCronExpression = (cron: string) => {
  try {
    CronExpressionParser.parse(cron);
    return true;
  } catch {
    return false;
  }
};

// Reusable URL validation
const urlValidation = z.string().min(1, 'URL is required').refine((val) => {
  try {
    new URL(val);
    return true;
  } catch {
    return false;
  }
}, {
  message: 'Invalid URL format',
});

const appTypeValidation = z
  .string()
  .transform(val => val.trim().toLowerCase())
  .pipe(z.enum(APP_TYPES, { errorMap: () => ({ message: `Must be one of: ${APP_TYPES.join(', ')}` }) }));

const daysValidation = z.number().int('Must be a whole number of days').nonnegative('Must not be negative');

export const instanceSchema = z.object({
  name: z.string().min(1, 'Name must not be empty').optional(),
  url: urlValidation,
  api_key: z.string().min(1, 'API key is required'),
  webhook: urlValidation.optional(),
  type: appTypeValidation.optional(),
  calendar_days: daysValidation.optional(),
  calendar_days_before: daysValidation.optional(),
  calendar_only: z.boolean().default(false),
});

export const defaultsSchema = z.object({
  calendar_days: daysValidation.default(DEFAULT_CALENDAR_DAYS),
  calendar_days_before: daysValidation.default(DEFAULT_CALENDAR_DAYS_BEFORE),
});

export const configFileSchema = z.object({
  interval: z.number().int('Interval must be a whole number of seconds').nonnegative('Interval must not be negative')
    .max(MAX_INTERVAL_SECONDS, `Interval must not exceed ${MAX_INTERVAL_SECONDS} seconds`)
    .optional(),
  schedule: z.string().refine(isValidCronExpression, 'Invalid cron expression').optional(),
  timezone: z.string().optional(),
  defaults: defaultsSchema.default({}),
  instances: z.array(instanceSchema).min(1, 'No instances defined in config file'),
});

export type InstanceFileConfig = z.infer<typeof instanceSchema>;
export type CollectorFileConfig = z.infer<typeof configFileSchema>;

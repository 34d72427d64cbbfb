import defaultLogger, { type Logger } from './logger.js';
import { getErrorMessage } from './errorUtils.js';

// en-US only names US zones; the others cover Europe, Australia, India and Japan
const ABBREVIATION_LOCALES = ['en-US', 'en-GB', 'en-AU', 'en-IN', 'ja-JP'] as const;

const OFFSET_ONLY = /^(GMT|UTC)[+-]/;

function formatZoneName(locale: string, timezone: string, now: Date): string | undefined {
  const parts = new Intl.DateTimeFormat(locale, {
    timeZone: timezone,
    timeZoneName: 'short',
  }).formatToParts(now);
  return parts.find(part => part.type === 'timeZoneName')?.value;
}

/**
 * Display abbreviation for an IANA zone at the given instant (EST, CEST, UTC...).
 * A zone no locale names renders as its offset (GMT+3). Falls back to the zone
 * name when it cannot be resolved, and to "UTC" when unset.
 */
export function getTimezoneAbbreviation(timezone: string | undefined, now: Date = new Date(), logger: Logger = defaultLogger): string {
  if (!timezone) {
    return 'UTC';
  }

  try {
    let offsetName: string | undefined;
    for (const locale of ABBREVIATION_LOCALES) {
      const name = formatZoneName(locale, timezone, now);
      if (name && !OFFSET_ONLY.test(name)) {
        return name;
      }
      offsetName = offsetName ?? name;
    }
    return offsetName || timezone;
  } catch (error: unknown) {
    logger.debug('⚠️  Could not resolve timezone abbreviation', { timezone, error: getErrorMessage(error) });
    return timezone;
  }
}

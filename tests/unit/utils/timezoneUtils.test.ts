import { describe, it, expect } from 'vitest';
import { getTimezoneAbbreviation } from '../../../src/utils/timezoneUtils.js';

describe('getTimezoneAbbreviation', () => {
  it('should default to UTC when no zone is configured', () => {
    expect(getTimezoneAbbreviation(undefined)).toBe('UTC');
    expect(getTimezoneAbbreviation('')).toBe('UTC');
  });

  it('should follow daylight saving for the given instant', () => {
    expect(getTimezoneAbbreviation('America/New_York', new Date('2024-01-15T12:00:00Z'))).toBe('EST');
    expect(getTimezoneAbbreviation('America/New_York', new Date('2024-07-15T12:00:00Z'))).toBe('EDT');
  });

  it('should name European and Pacific zones instead of printing an offset', () => {
    const summer = new Date('2024-07-01T12:00:00Z');
    expect(getTimezoneAbbreviation('Europe/Berlin', summer)).toBe('CEST');
    expect(getTimezoneAbbreviation('Europe/London', summer)).toBe('BST');
    expect(getTimezoneAbbreviation('Australia/Sydney', summer)).toBe('AEST');
  });

  it('should return UTC for the UTC zone', () => {
    expect(getTimezoneAbbreviation('UTC', new Date('2024-01-15T12:00:00Z'))).toBe('UTC');
  });

  it('should fall back to the zone name when it cannot be resolved', () => {
    expect(getTimezoneAbbreviation('Mars/Olympus_Mons')).toBe('Mars/Olympus_Mons');
  });
});

import { describe, it, expect } from 'vitest';
import { createProgram, parseCliOptions, runCli } from '../../src/cli.js';

function quietProgram() {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
}

describe('cli', () => {
  it('should parse single-instance options', () => {
    const options = parseCliOptions([
      'node', 'starr-collector',
      '-u', 'http://sonarr:8989',
      '-k', 'test-api-key',
      '-w', 'https://example.com/webhook',
      '-t', 'sonarr',
      '-d', '3',
      '-b', '1',
      '-c',
      '-z', 'Europe/Berlin',
      '-i', '900',
      '-v',
      '--dry-run',
    ], quietProgram());

    expect(options).toEqual({
      config: undefined,
      url: 'http://sonarr:8989',
      apiKey: 'test-api-key',
      webhook: 'https://example.com/webhook',
      type: 'sonarr',
      days: 3,
      daysBefore: 1,
      calendarOnly: true,
      timezone: 'Europe/Berlin',
      interval: 900,
      schedule: undefined,
      verbose: true,
      dryRun: true,
    });
  });

  it('should apply defaults', () => {
    const options = parseCliOptions(['node', 'starr-collector', '--config', 'config.yaml', '-s', '0 * * * *'], quietProgram());

    expect(options).toMatchObject({
      config: 'config.yaml',
      days: 7,
      daysBefore: 0,
      interval: 0,
      schedule: '0 * * * *',
      calendarOnly: false,
      verbose: false,
      dryRun: false,
      timezone: undefined,
    });
  });

  it('should reject non-numeric day counts', () => {
    expect(() => parseCliOptions(['node', 'starr-collector', '-d', 'soon'], quietProgram()))
      .toThrow(/Expected a non-negative whole number\./);
  });

  it('should reject intervals longer than a timer can hold', () => {
    expect(() => parseCliOptions(['node', 'starr-collector', '-i', '2147484'], quietProgram()))
      .toThrow(/Interval must not exceed 2147483 seconds\./);
    expect(parseCliOptions(['node', 'starr-collector', '-i', '2147483'], quietProgram()).interval).toBe(2147483);
  });

  it('should exit with 1 when no instance is given', async () => {
    await expect(runCli(['node', 'starr-collector'])).resolves.toBe(1);
  });

  it('should exit with 1 when the config file cannot be loaded', async () => {
    await expect(runCli(['node', 'starr-collector', '--config', '/nonexistent/starr-collector.yaml'])).resolves.toBe(1);
  });
});

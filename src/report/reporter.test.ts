/**
 * Tests for result reporting and exit codes
 */

import { reportOutcome, reportValidationErrors, reportWarnings } from './reporter.js';
import { resetLogger } from '../utils/logger.js';

describe('reporter', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    resetLogger();
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('reportOutcome', () => {
    it('should confirm success and return 0', () => {
      expect(reportOutcome({ kind: 'success' }, { quiet: false })).toBe(0);
      expect(log.mock.calls).toEqual([['[pushover-notify] Notification sent']]);
    });

    it('should include request and receipt ids when known', () => {
      reportOutcome({ kind: 'success', request: 'req-1', receipt: 'rcpt-1' }, { quiet: false });

      expect(log).toHaveBeenCalledWith(
        '[pushover-notify] Notification sent (request req-1, receipt rcpt-1)'
      );
    });

    it('should print nothing on success when quiet', () => {
      expect(reportOutcome({ kind: 'success', request: 'req-1' }, { quiet: true })).toBe(0);
      expect(log).not.toHaveBeenCalled();
    });

    it('should list every reason on failure and return 3', () => {
      const exitCode = reportOutcome(
        { kind: 'failure', reasons: ['HTTP 500 Internal Server Error', 'invalid token'] },
        { quiet: true }
      );

      expect(exitCode).toBe(3);
      expect(error.mock.calls).toEqual([
        ['[pushover-notify] ERROR: Failed to send notification:'],
        ['  - HTTP 500 Internal Server Error'],
        ['  - invalid token'],
      ]);
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('reportValidationErrors', () => {
    it('should print every error with a help pointer and return 2', () => {
      const exitCode = reportValidationErrors([
        'Missing required parameter --user',
        'Invalid --retry 10: must be at least 30 seconds',
      ]);

      expect(exitCode).toBe(2);
      expect(error.mock.calls).toEqual([
        ['[pushover-notify] ERROR: Missing required parameter --user'],
        ['[pushover-notify] ERROR: Invalid --retry 10: must be at least 30 seconds'],
        ['[pushover-notify] ERROR: Run with --help for usage.'],
      ]);
    });
  });

  describe('reportWarnings', () => {
    it('should print each warning to stderr', () => {
      reportWarnings(['--ttl is ignored when --priority is 2']);

      expect(warn.mock.calls).toEqual([
        ['[pushover-notify] WARNING: --ttl is ignored when --priority is 2'],
      ]);
    });
  });
});

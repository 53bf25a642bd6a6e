import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { exitCodeToErrorCode, ExitCodes, exitWithCode } from '../exit-codes.js';

describe('exit-codes', () => {
  it('defines unique codes', () => {
    const codes = Object.values(ExitCodes);
    expect(new Set(codes).size).toBe(codes.length);
    expect(ExitCodes.SUCCESS).toBe(0);
    expect(ExitCodes.UPSTREAM_ERROR).toBe(12);
  });

  it('maps codes to their names', () => {
    expect(exitCodeToErrorCode(ExitCodes.UPSTREAM_ERROR)).toBe('UPSTREAM_ERROR');
    expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
  });

  describe('exitWithCode', () => {
    let processExitSpy: MockInstance<typeof process.exit>;

    beforeEach(() => {
      processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
    });

    afterEach(() => {
      processExitSpy.mockRestore();
    });

    it('exits with the given code', () => {
      expect(() => exitWithCode(ExitCodes.NOT_FOUND)).toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(4);
    });
  });
});

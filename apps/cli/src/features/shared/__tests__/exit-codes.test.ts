import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes, exitWithCode } from '../exit-codes.js';

describe('exit-codes', () => {
  describe('ExitCodes', () => {
    it('should define the documented codes', () => {
      expect(ExitCodes.SUCCESS).toBe(0);
      expect(ExitCodes.GENERAL_ERROR).toBe(1);
      expect(ExitCodes.INVALID_ARGS).toBe(2);
      expect(ExitCodes.CONFIG_ERROR).toBe(11);
    });

    it('should have unique exit codes', () => {
      const codes = Object.values(ExitCodes);
      expect(new Set(codes).size).toBe(codes.length);
    });
  });

  describe('exitWithCode', () => {
    beforeEach(() => {
      // Mock process.exit to prevent actual process termination
      vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
        throw new Error('process.exit called');
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should call process.exit with the given code', () => {
      expect(() => exitWithCode(ExitCodes.CONFIG_ERROR)).toThrow('process.exit called');
      expect(process.exit).toHaveBeenCalledWith(11);
    });
  });
});

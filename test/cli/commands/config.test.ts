/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock dependencies before importing the command
vi.mock('../../../src/config/loader.js', () => ({
  loadConfig: vi.fn(),
  validateExternalConfig: vi.fn(),
}));

import { configCommand } from '../../../src/cli/commands/config.js';
import { loadConfig, validateExternalConfig } from '../../../src/config/loader.js';
import type { ResolvedConfig } from '../../../src/config/loader.js';

const mockLoadConfig = vi.mocked(loadConfig);
const mockValidateExternalConfig = vi.mocked(validateExternalConfig);

const fakeConfig: ResolvedConfig = {
  clustering: { epsilon: 0.3, minPoints: 5, strategy: 'indexed', metric: 'euclidean' },
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('configCommand', () => {
  it('has correct name and usage', () => {
    expect(configCommand.name).toBe('config');
    expect(configCommand.usage).toContain('show');
    expect(configCommand.usage).toContain('validate');
  });

  describe('show subcommand', () => {
    it('prints the loaded config as JSON', async () => {
      mockLoadConfig.mockReturnValue(fakeConfig);

      await configCommand.handler(['show']);

      expect(mockLoadConfig).toHaveBeenCalledOnce();
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(fakeConfig, null, 2));
    });
  });

  describe('validate subcommand', () => {
    it('prints success when config is valid', async () => {
      mockLoadConfig.mockReturnValue(fakeConfig);
      mockValidateExternalConfig.mockReturnValue([]);

      await configCommand.handler(['validate']);

      expect(mockValidateExternalConfig).toHaveBeenCalledWith(fakeConfig);
      expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('prints errors and exits with code 3 when config is invalid', async () => {
      mockLoadConfig.mockReturnValue(fakeConfig);
      mockValidateExternalConfig.mockReturnValue([
        'clustering.epsilon must be greater than 0',
        'clustering.minPoints must be a non-negative integer',
      ]);

      await configCommand.handler(['validate']);

      expect(console.error).toHaveBeenCalledWith('Configuration errors:');
      expect(console.error).toHaveBeenCalledWith('  - clustering.epsilon must be greater than 0');
      expect(console.error).toHaveBeenCalledWith(
        '  - clustering.minPoints must be a non-negative integer',
      );
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });

  describe('unknown subcommand', () => {
    it('prints usage and exits with code 2', async () => {
      await configCommand.handler([]);

      expect(console.error).toHaveBeenCalledWith('Error: subcommand required');
      expect(process.exit).toHaveBeenCalledWith(2);
    });
  });
});

import {
  ConfiguredOperatorPrompt,
  ConsoleOperatorPrompt,
  selectOperatorPrompt,
  type DuplicateNameQuestion,
} from './operator-prompt';
import type { ProvisioningConfig } from '../config/provisioning-config';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { LogLevel } from '../logging/log-levels';

describe('operator prompts', () => {
  const baseConfig: ProvisioningConfig = {
    directoryDomain: 'example.com',
    usageLocation: 'US',
    initialPassword: 'test-password',
    propagationDelayMs: 0,
    pacingDelayMs: 0,
    alternateUpnSuffix: '1',
    phoneCountryCode: '1',
    ticketHeaderMarker: '###',
  };

  const question: DuplicateNameQuestion = {
    userPrincipalName: 'John.Doe@example.com',
    alternatePrincipalName: 'John.Doe1@example.com',
    conflicts: [{ id: 'u0', displayName: 'John Doe', userPrincipalName: 'John.Doe@example.com' }],
  };

  let logger: ProvisioningLogger;

  beforeEach(() => {
    logger = new ProvisioningLogger({ globalLevel: LogLevel.OFF });
  });

  describe('ConfiguredOperatorPrompt', () => {
    it('should accept when configured to accept', async () => {
      const prompt = new ConfiguredOperatorPrompt({ ...baseConfig, alternateNameDecision: 'accept' }, logger);
      await expect(prompt.confirmAlternateName(question)).resolves.toBe(true);
    });

    it('should decline when configured to decline', async () => {
      const prompt = new ConfiguredOperatorPrompt({ ...baseConfig, alternateNameDecision: 'decline' }, logger);
      await expect(prompt.confirmAlternateName(question)).resolves.toBe(false);
    });

    it('should decline and warn when no decision is configured', async () => {
      const warn = jest.spyOn(logger, 'warn');
      const prompt = new ConfiguredOperatorPrompt(baseConfig, logger);

      await expect(prompt.confirmAlternateName(question)).resolves.toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('selectOperatorPrompt', () => {
    it('should ask on the terminal when interactive and undecided', () => {
      expect(selectOperatorPrompt(baseConfig, logger, true)).toBeInstanceOf(ConsoleOperatorPrompt);
    });

    it('should use the configured answer when not interactive', () => {
      expect(selectOperatorPrompt(baseConfig, logger, false)).toBeInstanceOf(ConfiguredOperatorPrompt);
    });

    it('should never ask on the terminal unless told stdin is free', () => {
      expect(selectOperatorPrompt(baseConfig, logger)).toBeInstanceOf(ConfiguredOperatorPrompt);
    });

    it('should prefer a configured decision over the terminal', () => {
      const config = { ...baseConfig, alternateNameDecision: 'accept' as const };
      expect(selectOperatorPrompt(config, logger, true)).toBeInstanceOf(ConfiguredOperatorPrompt);
    });
  });
});

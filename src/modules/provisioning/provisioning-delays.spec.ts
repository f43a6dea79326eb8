import { ProvisioningDelays } from './provisioning-delays';
import type { ProvisioningConfig } from '../config/provisioning-config';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { LogLevel } from '../logging/log-levels';

describe('ProvisioningDelays', () => {
  const config = (propagationDelayMs: number, pacingDelayMs: number): ProvisioningConfig => ({
    directoryDomain: 'example.com',
    usageLocation: 'US',
    initialPassword: 'test-password',
    propagationDelayMs,
    pacingDelayMs,
    alternateUpnSuffix: '1',
    phoneCountryCode: '1',
    ticketHeaderMarker: '###',
  });

  let logger: ProvisioningLogger;

  beforeEach(() => {
    logger = new ProvisioningLogger({ globalLevel: LogLevel.OFF });
  });

  it('should not wait or log when delays are zero', async () => {
    const info = jest.spyOn(logger, 'info');
    const delays = new ProvisioningDelays(config(0, 0), logger);

    await delays.waitForPropagation();
    await delays.pace();

    expect(info).not.toHaveBeenCalled();
  });

  it('should wait for the configured propagation delay', async () => {
    const delays = new ProvisioningDelays(config(30, 0), logger);
    const started = Date.now();

    await delays.waitForPropagation();

    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });

  it('should pace for the configured pacing delay', async () => {
    const delays = new ProvisioningDelays(config(0, 30), logger);
    const started = Date.now();

    await delays.pace();

    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });
});

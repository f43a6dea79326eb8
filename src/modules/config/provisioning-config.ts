import type { ConfigService } from '@nestjs/config';
import * as crypto from 'node:crypto';

import { createProvisioningError, PROVISIONING_ERROR_KIND } from '../../domain/errors/provisioning-error';
import { DEFAULT_HEADER_MARKER } from '../ticket/raw-ticket-parser';

/** Injection token for the resolved ProvisioningConfig. */
export const PROVISIONING_CONFIG = 'PROVISIONING_CONFIG';

export type AlternateNameDecision = 'accept' | 'decline';

export interface ProvisioningConfig {
  /** Domain part of every principal name. */
  directoryDomain: string;
  usageLocation: string;
  /** Fixed initial password; the user must change it at first sign-in. */
  initialPassword: string;
  /** Wait after creation, before the phone step. */
  propagationDelayMs: number;
  /** Cosmetic pause between externally visible actions. 0 disables it. */
  pacingDelayMs: number;
  /** Inserted before '@' for the single alternate principal name. */
  alternateUpnSuffix: string;
  phoneCountryCode: string;
  ticketHeaderMarker: string;
  /** Unattended answer to the duplicate-name question; undefined means ask. */
  alternateNameDecision?: AlternateNameDecision;
}

function configurationError(detail: string): Error {
  return createProvisioningError({ kind: PROVISIONING_ERROR_KIND.CONFIGURATION, detail });
}

function readDelay(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string>(key);
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw configurationError(`Invalid value "${raw}" for ${key}. Expected a non-negative integer (milliseconds).`);
  }
  return value;
}

function readDecision(config: ConfigService): AlternateNameDecision | undefined {
  const raw = config.get<string>('ALTERNATE_NAME_DECISION')?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === 'accept' || raw === 'decline') return raw;
  throw configurationError(`Invalid value "${raw}" for ALTERNATE_NAME_DECISION. Allowed values: "accept", "decline".`);
}

/**
 * Resolve the provisioning settings from the environment.
 *
 * INITIAL_PASSWORD is required in production; elsewhere a random one is
 * generated so local runs work without it.
 */
export function buildProvisioningConfig(config: ConfigService): ProvisioningConfig {
  const directoryDomain = config.get<string>('DIRECTORY_DOMAIN')?.trim().replace(/^@/, '');
  if (!directoryDomain) {
    throw configurationError('DIRECTORY_DOMAIN is required (e.g. "example.com").');
  }

  let initialPassword = config.get<string>('INITIAL_PASSWORD');
  if (!initialPassword) {
    if (process.env.NODE_ENV === 'production') {
      throw configurationError('INITIAL_PASSWORD is required in production.');
    }
    initialPassword = `Tmp-${crypto.randomBytes(9).toString('base64url')}1!`;
  }

  const phoneCountryCode = (config.get<string>('PHONE_COUNTRY_CODE') ?? '1').trim().replace(/^\+/, '');
  if (!/^\d{1,3}$/.test(phoneCountryCode)) {
    throw configurationError(`Invalid value "${phoneCountryCode}" for PHONE_COUNTRY_CODE. Expected 1-3 digits.`);
  }

  return {
    directoryDomain,
    usageLocation: config.get<string>('USAGE_LOCATION')?.trim() || 'US',
    initialPassword,
    propagationDelayMs: readDelay(config, 'PROPAGATION_DELAY_MS', 15000),
    pacingDelayMs: readDelay(config, 'PACING_DELAY_MS', 0),
    alternateUpnSuffix: config.get<string>('ALTERNATE_UPN_SUFFIX')?.trim() || '1',
    phoneCountryCode,
    ticketHeaderMarker: config.get<string>('TICKET_HEADER_MARKER')?.trim() || DEFAULT_HEADER_MARKER,
    alternateNameDecision: readDecision(config),
  };
}

import { DEFAULT_PIN_LENGTH, MAX_PIN_LENGTH } from '@tapconsent/domain';
import { DEFAULT_TAG_PROTOCOL, type TagProtocol } from '@tapconsent/tag-engine';
import { z } from 'zod';
import { DEFAULT_SESSION_TIMEOUT_SECONDS } from './collaborators/SimulatedPinDelivery';
import { ConfigError } from './errors/ConfigError';

export const DEFAULT_API_BASE_URL = 'http://localhost:3000/api';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  TAPCONSENT_API_BASE_URL: z.url().default(DEFAULT_API_BASE_URL),
  TAPCONSENT_FALLBACK_BASE_URL: z
    .url()
    .default(DEFAULT_TAG_PROTOCOL.fallbackBaseUrl),
  TAPCONSENT_EXTERNAL_TYPE: z
    .string()
    .regex(/^[^\s:]+:[^\s:]+$/, 'must look like domain:type')
    .default(DEFAULT_TAG_PROTOCOL.externalType),
  TAPCONSENT_RECORD_VERSION: z
    .string()
    .min(1)
    .default(DEFAULT_TAG_PROTOCOL.recordVersion),
  TAPCONSENT_PIN_LENGTH: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_PIN_LENGTH)
    .default(DEFAULT_PIN_LENGTH),
  TAPCONSENT_SESSION_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SESSION_TIMEOUT_SECONDS),
  TAPCONSENT_ALLOW_SIMULATED_PIN: flag.default(false),
  TAPCONSENT_SIMULATE: flag.default(false),
});

export type VerificationConfig = Readonly<{
  apiBaseUrl: string;
  protocol: TagProtocol;
  pinLength: number;
  sessionTimeoutSeconds: number;
  /** Let sessions carrying a simulated PIN be checked locally. */
  allowSimulatedPin: boolean;
  /** Use the in-process PIN delivery and profile directory. */
  simulate: boolean;
}>;

/**
 * Reads `TAPCONSENT_*` variables. Unset or empty variables take their
 * defaults; anything else invalid throws a `ConfigError` naming every bad
 * variable.
 */
export const loadConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env
): VerificationConfig => {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('TAPCONSENT_') && value !== undefined && value !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  return {
    apiBaseUrl: vars.TAPCONSENT_API_BASE_URL,
    protocol: {
      ...DEFAULT_TAG_PROTOCOL,
      externalType: vars.TAPCONSENT_EXTERNAL_TYPE,
      fallbackBaseUrl: vars.TAPCONSENT_FALLBACK_BASE_URL,
      recordVersion: vars.TAPCONSENT_RECORD_VERSION,
    },
    pinLength: vars.TAPCONSENT_PIN_LENGTH,
    sessionTimeoutSeconds: vars.TAPCONSENT_SESSION_TIMEOUT_SECONDS,
    allowSimulatedPin: vars.TAPCONSENT_ALLOW_SIMULATED_PIN,
    simulate: vars.TAPCONSENT_SIMULATE,
  };
};

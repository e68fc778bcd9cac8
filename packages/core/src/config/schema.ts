/**
 * Configuration schema (Zod)
 *
 * Validates the openassoc YAML configuration. Sections are optional; an empty
 * file yields the defaults below.
 */

import { z } from 'zod';

// ===== Security settings (applied independently by each side) =====

export const SecuritySettingsSchema = z
  .object({
    minimum_hash_bit_length: z.number().int().min(0).default(160),
    maximum_hash_bit_length: z.number().int().min(0).default(256),
    /** Refuse unencrypted sessions even over a secure transport */
    require_association_security: z.boolean().default(false),
    /** Accept Diffie-Hellman sessions when the transport is already secure */
    allow_dh_over_secure_transport: z.boolean().default(true),
  })
  .refine(s => s.minimum_hash_bit_length <= s.maximum_hash_bit_length, {
    message: 'minimum_hash_bit_length must not exceed maximum_hash_bit_length',
    path: ['minimum_hash_bit_length'],
  })
  .transform(s => ({
    minimumHashBitLength: s.minimum_hash_bit_length,
    maximumHashBitLength: s.maximum_hash_bit_length,
    requireAssociationSecurity: s.require_association_security,
    allowDiffieHellmanOverSecureTransport: s.allow_dh_over_secure_transport,
  }));

export type SecuritySettings = z.output<typeof SecuritySettingsSchema>;

// ===== Relying party =====

const RelyingPartyConfigSchema = z.object({
  security: SecuritySettingsSchema.default({}),
  /** Upper bound on one associate round trip */
  request_timeout_ms: z.number().int().min(100).max(600000).default(10000),
});

// ===== Provider =====

/** Longest association lifetime either side accepts (one year) */
export const MAX_ASSOCIATION_LIFETIME_SECONDS = 31536000;

const ProviderConfigSchema = z.object({
  security: SecuritySettingsSchema.default({}),
  /** 14 days */
  smart_association_lifetime_seconds: z
    .number()
    .int()
    .min(60)
    .max(MAX_ASSOCIATION_LIFETIME_SECONDS)
    .default(1209600),
  dumb_association_lifetime_seconds: z
    .number()
    .int()
    .min(1)
    .max(MAX_ASSOCIATION_LIFETIME_SECONDS)
    .default(300),
  /** Insert attempts before a handle collision is treated as store corruption */
  handle_retry_limit: z.number().int().min(1).max(10).default(3),
});

// ===== Association store =====

const StoreConfigSchema = z.object({
  /** 0 disables the periodic sweep; expired entries are still hidden from lookup */
  sweep_interval_ms: z.number().int().min(0).default(60000),
});

// ===== Root Configuration Schema =====

export const OpenAssocConfigSchema = z.object({
  relying_party: RelyingPartyConfigSchema.default({}),
  provider: ProviderConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
});

export type OpenAssocConfig = z.infer<typeof OpenAssocConfigSchema>;
export type RelyingPartyConfig = OpenAssocConfig['relying_party'];
export type ProviderConfig = OpenAssocConfig['provider'];

/**
 * Security settings with every default applied
 */
export function defaultSecuritySettings(): SecuritySettings {
  return SecuritySettingsSchema.parse({});
}

/**
 * Full configuration with every default applied
 */
export function defaultConfig(): OpenAssocConfig {
  return OpenAssocConfigSchema.parse({});
}

/**
 * Zod schemas for configuration and resource input validation
 */
import { isIP } from 'net';
import { z } from 'zod';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// Cloudflare client config schema
export const cloudflareConfigSchema = z.object({
  apiToken: z.string().min(1),
  organizationId: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  maxRetries: z.coerce.number().int().min(0).max(10).default(2),
  timeout: z.coerce.number().int().min(1000).default(60000),
});

// Lookup (pagination) config schema
export const lookupConfigSchema = z.object({
  perPage: z.coerce.number().int().min(5).max(1000).default(50),
  maxPages: z.coerce.number().int().min(1).default(500),
});

export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  cloudflare: cloudflareConfigSchema,
  lookup: lookupConfigSchema,
});

// Access rule enums
export const accessRuleModeSchema = z.enum(['block', 'challenge', 'whitelist', 'js_challenge']);
export const accessRuleTargetSchema = z.enum(['ip', 'ip_range', 'asn', 'country']);
export const ruleScopeSchema = z.enum(['zone', 'organization']);

/**
 * Address plus prefix length, e.g. 198.51.100.0/24 or 2001:db8::/32
 */
export function isValidIpRange(value: string): boolean {
  const slash = value.lastIndexOf('/');
  if (slash <= 0) return false;

  const address = value.slice(0, slash);
  const prefix = value.slice(slash + 1);
  if (!/^\d{1,3}$/.test(prefix)) return false;

  const version = isIP(address);
  if (version === 0) return false;

  const bits = parseInt(prefix, 10);
  return bits <= (version === 4 ? 32 : 128);
}

const targetValueChecks: Record<z.infer<typeof accessRuleTargetSchema>, { test: (v: string) => boolean; message: string }> = {
  ip: { test: (v) => isIP(v) !== 0, message: 'must be a single IPv4 or IPv6 address' },
  ip_range: { test: isValidIpRange, message: 'must be an address with a prefix length, e.g. 198.51.100.0/24' },
  asn: { test: (v) => /^AS\d+$/.test(v), message: 'must be an AS number, e.g. AS13335' },
  country: { test: (v) => /^[A-Z]{2}$/.test(v), message: 'must be a two-letter uppercase country code' },
};

// Access rule resource input
export const accessRuleInputSchema = z
  .object({
    zone: z.string().min(1),
    scope: ruleScopeSchema,
    mode: accessRuleModeSchema,
    target: accessRuleTargetSchema,
    value: z.string().min(1),
    notes: z.string().max(1024).default(''),
  })
  .superRefine((input, ctx) => {
    const check = targetValueChecks[input.target];
    if (!check.test(input.value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: `${input.target} value ${check.message}`,
      });
    }
  });

const ipAddressSchema = z.string().refine((v) => isIP(v) !== 0, { message: 'must be a single IP address' });

// Virtual DNS resource input
export const virtualDnsInputSchema = z.object({
  name: z.string().min(1).max(160),
  originIps: z.array(ipAddressSchema).min(1),
  virtualDnsIps: z.array(ipAddressSchema).optional(),
  minimumCacheTtl: z.number().int().min(30).max(36000).default(60),
  maximumCacheTtl: z.number().int().min(30).max(36000).default(900),
  deprecateAnyRequests: z.boolean().default(false),
  ecsFallback: z.boolean().default(false),
  ratelimit: z.number().int().min(0).max(100000000).default(5000),
});

// Export types inferred from schemas
export type CloudflareConfig = z.infer<typeof cloudflareConfigSchema>;
export type LookupConfig = z.infer<typeof lookupConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type AccessRuleResourceInput = z.input<typeof accessRuleInputSchema>;
export type AccessRuleResourceConfig = z.output<typeof accessRuleInputSchema>;
export type VirtualDNSResourceInput = z.input<typeof virtualDnsInputSchema>;
export type VirtualDNSResourceConfig = z.output<typeof virtualDnsInputSchema>;

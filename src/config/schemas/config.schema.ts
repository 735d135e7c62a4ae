import { z } from 'zod';

// =============================================================================
// Destination Schemas
// =============================================================================

export const InfluxDB2ConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  token: z.string(),
  org: z.string(),
  bucket: z.string(),
  verifySsl: z.boolean().default(true),
});

// =============================================================================
// Device Schemas
// =============================================================================

export const AuthModeSchema = z.enum(['all', 'default_only', 'legacy_only']);

const DeviceEntrySchema = z.object({
  name: z.string().min(1),
  ip: z.string().min(1),
});

export const KasaConfigSchema = z.object({
  auth: z
    .object({
      user: z.string(),
      passw: z.string(),
    })
    .optional(),
  devices: z.array(DeviceEntrySchema).default([]),
});

export const TapoConfigSchema = z.object({
  user: z.string(),
  passw: z.string(),
  devices: z
    .array(
      DeviceEntrySchema.extend({
        auth: AuthModeSchema.optional(),
      })
    )
    .default([]),
});

export const DevicesConfigSchema = z
  .object({
    kasa: KasaConfigSchema.optional(),
    tapo: TapoConfigSchema.optional(),
  })
  .default({})
  .refine((data) => data.kasa !== undefined || data.tapo !== undefined, {
    message: 'At least one device family (kasa or tapo) must be configured',
  });

// =============================================================================
// Poller Schema
// =============================================================================

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const LogLevelSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const level = value.toLowerCase();
  // Level names written by older configuration files
  if (level === 'warning') return 'warn';
  if (level === 'critical') return 'error';
  return level;
}, z.enum(LOG_LEVELS));

export const PollerConfigSchema = z.object({
  persist: z.boolean().default(false),
  interval: z.number().int().positive().optional(),
  loglevel: LogLevelSchema.default('info'),
  concurrency: z.number().int().positive().default(4),
  deviceTimeout: z.number().positive().default(10),
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const PlugpollConfigSchema = z.object({
  destinations: z.array(InfluxDB2ConfigSchema).default([]),
  devices: DevicesConfigSchema,
  poller: PollerConfigSchema.default({}),
});

export type PlugpollConfig = z.infer<typeof PlugpollConfigSchema>;
export type KasaConfig = z.infer<typeof KasaConfigSchema>;
export type TapoConfig = z.infer<typeof TapoConfigSchema>;
export type PollerConfig = z.infer<typeof PollerConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

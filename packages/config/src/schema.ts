import { z } from 'zod'

const HEX = /^[0-9a-fA-F]*$/

/**
 * Probe endpoint configuration schema
 */
const ProbeConfigSchema = z.object({
  url: z
    .string()
    .url()
    .default('http://connect.rom.miui.com/generate_204')
    .describe('Endpoint that answers 204 when the network is open'),
})

/**
 * Network configuration schema
 */
const NetworkConfigSchema = z.object({
  proxy: z.string().url().optional().describe('HTTP proxy for all portal traffic'),
  requestTimeout: z.number().int().min(100).default(10000).describe('Request timeout in milliseconds'),
  logoutTimeout: z.number().int().min(100).default(5000).describe('Logout request timeout in milliseconds'),
})

/**
 * Heartbeat configuration schema
 */
const HeartbeatConfigSchema = z.object({
  defaultInterval: z
    .number()
    .int()
    .min(1)
    .default(60)
    .describe('Heartbeat interval in seconds until the portal advertises one'),
})

/**
 * Account configuration schema
 * Empty credentials pass the schema; the session engine rejects them at startup.
 */
const AccountConfigSchema = z.object({
  username: z.string(),
  password: z.string(),
  bindInterface: z.string().optional().describe('Network interface to bind outgoing requests to'),
  checkInterval: z
    .number()
    .int()
    .default(10000)
    .describe('Network probe interval in milliseconds (non-positive means default)'),
  retryInterval: z
    .number()
    .int()
    .default(10000)
    .describe('Probe interval after a failure in milliseconds (0 means default, negative means never)'),
  hostname: z.string().optional(),
  macAddress: z
    .string()
    .regex(/^([0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}$/, 'Invalid MAC address')
    .optional(),
})

/**
 * Keyed cipher schema
 */
const CipherKeySchema = z.object({
  type: z.enum(['aes-128-cbc', 'aes-256-cbc', 'aes-256-gcm']),
  key: z.string().regex(HEX, 'Key must be hex encoded'),
  iv: z.string().regex(HEX, 'IV must be hex encoded').optional(),
})

/**
 * Logging configuration schema
 */
const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'compact']).default('compact'),
})

/**
 * Main portalkeep configuration schema
 */
export const PortalKeepConfigSchema = z
  .object({
    $schema: z.string().optional().describe('JSON schema reference'),
    probe: ProbeConfigSchema.default({}),
    network: NetworkConfigSchema.default({}),
    heartbeat: HeartbeatConfigSchema.default({}),
    accounts: z.array(AccountConfigSchema).default([]),
    ciphers: z.record(CipherKeySchema).default({}).describe('Key material per algorithm id'),
    logging: LoggingConfigSchema.default({}),
  })
  .strict()

export {
  ProbeConfigSchema,
  NetworkConfigSchema,
  HeartbeatConfigSchema,
  AccountConfigSchema,
  CipherKeySchema,
  LoggingConfigSchema,
}

export type PortalKeepConfig = z.infer<typeof PortalKeepConfigSchema>
export type ProbeConfig = z.infer<typeof ProbeConfigSchema>
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>
export type HeartbeatConfig = z.infer<typeof HeartbeatConfigSchema>
export type AccountConfig = z.infer<typeof AccountConfigSchema>
export type CipherKeyConfig = z.infer<typeof CipherKeySchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

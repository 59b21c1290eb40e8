import { z } from 'zod'
import { ConfigurationError } from '../core/errors.js'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type ConfiguredLogLevel = (typeof LOG_LEVELS)[number]

export type XmlApiConfig = {
  address: string
  connectTimeoutMs: number | null
  headers: Record<string, string>
  basicAuth: { user: string; pass: string } | null
}

const MISSING_ADDRESS_MESSAGE = 'Please specify the address of the CCU.'

const BasicAuthSchema = z.object({
  user: z.string(),
  pass: z.string(),
}).strict()

const XmlApiConfigSchema = z.object({
  address: z.string({
    required_error: MISSING_ADDRESS_MESSAGE,
    invalid_type_error: MISSING_ADDRESS_MESSAGE,
  }),
  connectTimeoutMs: z.number().int().min(1).nullable().default(null),
  headers: z.record(z.string().min(1), z.string()).default({}),
  basicAuth: BasicAuthSchema.nullable().default(null),
}).strict()

/**
 * Validate client options from arbitrary input.
 *
 * The address is only checked for being a string; normalization happens in
 * the client.
 */
export function parseXmlApiConfig(input: unknown): XmlApiConfig {
  if (!input || typeof input !== 'object' || Array.isArray(input)) {
    throw new ConfigurationError(MISSING_ADDRESS_MESSAGE)
  }

  const result = XmlApiConfigSchema.safeParse(input)
  if (!result.success) {
    const addressIssue = result.error.issues.find((issue) => issue.path[0] === 'address')
    if (addressIssue) {
      throw new ConfigurationError(MISSING_ADDRESS_MESSAGE)
    }
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid XML API options: ${message}`)
  }

  return result.data
}

const EnvSchema = z.object({
  CCU_ADDRESS: z.string().min(1).optional(),
  CCU_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1).optional(),
  CCU_USERNAME: z.string().optional(),
  CCU_PASSWORD: z.string().optional(),
  CCU_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
})

export type EnvXmlApiConfig = {
  /** Partial options; `address` is absent when `CCU_ADDRESS` is unset. */
  options: Record<string, unknown>
  logLevel: ConfiguredLogLevel
}

/**
 * Read client options from environment variables.
 *
 * Credentials are only used when both `CCU_USERNAME` and `CCU_PASSWORD` are set.
 */
export function loadXmlApiConfig(env: Record<string, string | undefined>): EnvXmlApiConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Environment validation failed: ${message}`)
  }

  const parsed = result.data
  const options: Record<string, unknown> = {}
  if (parsed.CCU_ADDRESS !== undefined) options.address = parsed.CCU_ADDRESS
  if (parsed.CCU_CONNECT_TIMEOUT_MS !== undefined) options.connectTimeoutMs = parsed.CCU_CONNECT_TIMEOUT_MS
  if (parsed.CCU_USERNAME !== undefined && parsed.CCU_PASSWORD !== undefined) {
    options.basicAuth = { user: parsed.CCU_USERNAME, pass: parsed.CCU_PASSWORD }
  }

  return { options, logLevel: parsed.CCU_LOG_LEVEL }
}

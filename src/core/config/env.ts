import { z } from 'zod'

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SERVICE_NAME: z.string().min(1).default('canonical-log-events'),
  /** Deployment environment reported on every line; falls back to NODE_ENV */
  DEPLOY_ENV: z.string().min(1).optional(),
  SERVICE_VERSION: z.string().min(1).default('1.0.0'),
  /** Comma-separated keys masked in addition to the built-in list */
  LOG_SENSITIVE_KEYS: z
    .string()
    .optional()
    .transform((raw) =>
      (raw ?? '')
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0),
    ),
})

export type EnvConfig = z.infer<typeof EnvSchema>

export type AppConfig = {
  nodeEnv: EnvConfig['NODE_ENV']
  logLevel: EnvConfig['LOG_LEVEL']
  service: string
  env: string
  version: string
  sensitiveKeys: string[]
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    service: parsed.SERVICE_NAME,
    env: parsed.DEPLOY_ENV ?? parsed.NODE_ENV,
    version: parsed.SERVICE_VERSION,
    sensitiveKeys: parsed.LOG_SENSITIVE_KEYS,
  }
}

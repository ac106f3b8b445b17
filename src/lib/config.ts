import { z } from 'zod'

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => {
      if (value === undefined || value === '') return fallback
      return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
    })

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  APP_ENV: z.enum(['development', 'staging', 'production']).default('development'),
  DATABASE_URL: z.string().optional(),
  NEXT_PUBLIC_APP_URL: z.string().default('http://localhost:3000'),
  ADMIN_EMAIL: z.string().email().default('admin@example.org'),
  ADMIN_EMAILS: z.string().default(''),
  STRIPE_SECRET_KEY: z.string().optional(),
  STRIPE_PUBLISHABLE_KEY: z.string().optional(),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  EMAIL_PROVIDER: z.enum(['resend', 'console']).optional(),
  RESEND_API_KEY: z.string().optional(),
  EMAIL_FROM: z.string().default('Civic <noreply@example.org>'),
  EMAIL_QUEUE_ENABLED: booleanFlag(true),
  CRON_SECRET: z.string().optional(),
  INVENTORY_AUTO_RESOLVE_THRESHOLD: z.coerce.number().int().positive().default(3),
  POSTGIS_ENABLED: booleanFlag(true),
})

export type AppConfig = {
  nodeEnv: string
  appEnv: 'development' | 'staging' | 'production'
  databaseUrl: string | undefined
  appUrl: string
  adminEmail: string
  adminEmails: string[]
  stripe: {
    secretKey: string | undefined
    publishableKey: string | undefined
    webhookSecret: string | undefined
  }
  email: {
    provider: 'resend' | 'console'
    resendApiKey: string | undefined
    from: string
    queueEnabled: boolean
  }
  cronSecret: string | undefined
  inventoryAutoResolveThreshold: number
  postgisEnabled: boolean
}

/**
 * Normalize a database URL. Some hosts hand out `postgres://`, which
 * older drivers and tooling reject.
 */
export function normalizeDatabaseUrl(url: string | undefined): string | undefined {
  if (!url) return undefined
  return url.startsWith('postgres://') ? url.replace('postgres://', 'postgresql://') : url
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.')).join(', ')
    throw new Error(`Invalid environment configuration: ${fields}`)
  }
  const e = parsed.data

  const provider = e.EMAIL_PROVIDER ?? (e.RESEND_API_KEY ? 'resend' : 'console')

  return {
    nodeEnv: e.NODE_ENV,
    appEnv: e.APP_ENV,
    databaseUrl: normalizeDatabaseUrl(e.DATABASE_URL),
    appUrl: e.NEXT_PUBLIC_APP_URL.replace(/\/$/, ''),
    adminEmail: e.ADMIN_EMAIL.toLowerCase(),
    adminEmails: e.ADMIN_EMAILS.split(',').map(s => s.trim().toLowerCase()).filter(Boolean),
    stripe: {
      secretKey: e.STRIPE_SECRET_KEY,
      publishableKey: e.STRIPE_PUBLISHABLE_KEY,
      webhookSecret: e.STRIPE_WEBHOOK_SECRET,
    },
    email: {
      provider,
      resendApiKey: e.RESEND_API_KEY,
      from: e.EMAIL_FROM,
      queueEnabled: e.EMAIL_QUEUE_ENABLED,
    },
    cronSecret: e.CRON_SECRET,
    inventoryAutoResolveThreshold: e.INVENTORY_AUTO_RESOLVE_THRESHOLD,
    postgisEnabled: e.POSTGIS_ENABLED,
  }
}

let _config: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig()
  }
  return _config
}

// Tests swap env vars between cases
export function resetConfig() {
  _config = null
}

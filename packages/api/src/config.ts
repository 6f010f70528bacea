// ---------------------------------------------------------------------------
// Runtime configuration
//
// Read once from the environment at startup and validated, so a bad value
// fails the process immediately instead of on the first request.
//
//   PORT           — HTTP port (default: 3000)
//   DATABASE_PATH  — SQLite file, or ":memory:" (default: data/waybill.db)
//   LOG_LEVEL      — "info" or "silent" (default: info)
// ---------------------------------------------------------------------------

import { z } from 'zod'

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  DATABASE_PATH: z.string().min(1).default('data/waybill.db'),
  LOG_LEVEL: z.enum(['info', 'silent']).default('info'),
})

export type Config = {
  nodeEnv: 'development' | 'test' | 'production'
  port: number
  databasePath: string
  logLevel: 'info' | 'silent'
}

/**
 * Parses configuration from an environment map.
 *
 * @throws {Error} listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const r = EnvSchema.safeParse(env)
  if (!r.success) {
    const problems = r.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }
  return {
    nodeEnv: r.data.NODE_ENV,
    port: r.data.PORT,
    databasePath: r.data.DATABASE_PATH,
    logLevel: r.data.LOG_LEVEL,
  }
}

export const config: Config = loadConfig()

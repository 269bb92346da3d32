// services/list-api/src/core/serverConfig.ts
import { asBool, asInt, asString, clampInt } from './env.js'

export type ServerConfig = {
  host: string
  port: number
  request: {
    verbose: boolean
    logHeaders: boolean
    /** Log every Nth request. */
    sample: number
  }
  sessions: {
    idleTtlMs: number
    maxEntries: number
  }
}

/**
 * Build ServerConfig from environment variables.
 *
 * - API_HOST / API_PORT
 * - REQUEST_VERBOSE / REQUEST_LOG_HEADERS / REQUEST_SAMPLE
 * - SESSION_IDLE_TTL_MS / SESSION_MAX
 */
export function readServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    host: asString(env.API_HOST, '0.0.0.0'),
    port: clampInt(asInt(env.API_PORT, 3000), 0, 65_535),
    request: {
      verbose: asBool(env.REQUEST_VERBOSE, false),
      logHeaders: asBool(env.REQUEST_LOG_HEADERS, false),
      sample: clampInt(asInt(env.REQUEST_SAMPLE, 1), 1, 10_000),
    },
    sessions: {
      idleTtlMs: clampInt(asInt(env.SESSION_IDLE_TTL_MS, 3_600_000), 1_000, 604_800_000),
      maxEntries: clampInt(asInt(env.SESSION_MAX, 100), 1, 100_000),
    },
  }
}

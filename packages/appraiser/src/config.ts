/**
 * config.ts: loads environment variables into a typed AppConfig.
 *
 * env vars:
 *   APPRAISER_LOG_LEVEL          debug | info | warn | error (default warn)
 *   APPRAISER_DNS_TIMEOUT_MS     per-query DNS timeout (default 5000, min 100)
 *   APPRAISER_WHOIS_TIMEOUT_MS   WHOIS socket timeout (default 10000, min 100)
 *   APPRAISER_LOOKUP_TIMEOUT_MS  upper bound on any single lookup (default 15000, min 100)
 */

import type { AppConfig, LogLevel } from './types'

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error']
const MIN_TIMEOUT_MS = 100

type Env = Record<string, string | undefined>

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value)

const envOrDefault = (env: Env, key: string, fallback: string): string => env[key] ?? fallback

const timeoutFrom = (env: Env, key: string, fallback: number): number => {
  const value = Number(envOrDefault(env, key, String(fallback)))
  if (isNaN(value) || value < MIN_TIMEOUT_MS) {
    throw new Error(`${key} must be a number >= ${MIN_TIMEOUT_MS}`)
  }
  return value
}

export const loadConfig = (env: Env = process.env): AppConfig => {
  const logLevel = envOrDefault(env, 'APPRAISER_LOG_LEVEL', 'warn')
  if (!isLogLevel(logLevel)) {
    throw new Error(`APPRAISER_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`)
  }

  return {
    logLevel,
    dnsTimeoutMs: timeoutFrom(env, 'APPRAISER_DNS_TIMEOUT_MS', 5000),
    whoisTimeoutMs: timeoutFrom(env, 'APPRAISER_WHOIS_TIMEOUT_MS', 10000),
    lookupTimeoutMs: timeoutFrom(env, 'APPRAISER_LOOKUP_TIMEOUT_MS', 15000),
  }
}

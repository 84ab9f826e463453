/**
 * Service configuration, read once from the environment.
 *
 *   TRANSCRIPT_PORT          listen port (default 7891)
 *   TRANSCRIPT_WORKSPACE     directory holding transcripts.db (default ".")
 *   TRANSCRIPT_PERSIST       "false" runs without a database
 *   TRANSCRIPT_CORS_ORIGIN   comma-separated CORS allow-list
 *
 * LOG_LEVEL is read by the logger itself.
 */

export interface ServiceConfig {
  port: number
  workspace: string
  persist: boolean
  corsOrigin: string | undefined
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return 7891
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`TRANSCRIPT_PORT must be an integer between 0 and 65535, got "${raw}"`)
  }
  return port
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: parsePort(env.TRANSCRIPT_PORT),
    workspace: env.TRANSCRIPT_WORKSPACE ?? '.',
    persist: env.TRANSCRIPT_PERSIST?.toLowerCase() !== 'false',
    corsOrigin: env.TRANSCRIPT_CORS_ORIGIN,
  }
}

/**
 * CORS allow-list and response security headers for the JSON API.
 */

import type { IncomingMessage, ServerResponse } from 'node:http'

// ── CORS ──────────────────────────────────────────────────────────

export interface CorsConfig {
  /** Empty means same-origin only: no CORS headers are ever sent. */
  allowedOrigins: string[]
}

/**
 * Comma-separated origins, e.g. "http://localhost:5173,https://intake.example".
 * "*" is not special and only matches an Origin of literally "*".
 */
export function parseCorsOrigins(envValue: string | undefined): CorsConfig {
  if (!envValue || envValue.trim() === '') return { allowedOrigins: [] }
  return {
    allowedOrigins: envValue
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
  }
}

/**
 * Sets CORS headers when the request's Origin is allowed. Requests without an
 * Origin header are same-origin and count as allowed.
 */
export function setCorsHeaders(
  req: IncomingMessage,
  res: ServerResponse,
  config: CorsConfig,
): boolean {
  const origin = req.headers.origin
  if (!origin) return true

  const allowed = config.allowedOrigins.includes(origin)
  if (allowed) {
    res.setHeader('Access-Control-Allow-Origin', origin)
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-Id')
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-Id')
    res.setHeader('Vary', 'Origin')
  }
  return allowed
}

// ── Security headers ──────────────────────────────────────────────

function isLocalhost(host: string | undefined): boolean {
  if (!host) return true
  const hostname = host.replace(/:\d+$/, '')
  return ['localhost', '127.0.0.1', '[::1]', '::1', '0.0.0.0'].includes(hostname)
}

// The service only ever answers with JSON.
const CSP = "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'"

export function setSecurityHeaders(req: IncomingMessage, res: ServerResponse): void {
  res.setHeader('X-Content-Type-Options', 'nosniff')
  res.setHeader('X-Frame-Options', 'DENY')
  res.setHeader('Referrer-Policy', 'no-referrer')
  res.setHeader('Cache-Control', 'no-store')
  res.setHeader('Content-Security-Policy', CSP)

  if (!isLocalhost(req.headers.host)) {
    res.setHeader('Strict-Transport-Security', 'max-age=63072000; includeSubDomains')
  }
}

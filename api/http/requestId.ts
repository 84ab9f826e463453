/**
 * Correlation id for one HTTP request: the caller's `x-request-id` when it
 * is a sane token, otherwise a fresh UUID. Echoed back on the response and
 * attached to every log line of the request.
 */

import { randomUUID } from 'node:crypto'
import type { IncomingMessage } from 'node:http'

const REQUEST_ID = /^[\w.:-]{1,128}$/

export function getRequestId(req: IncomingMessage): string {
  const header = req.headers['x-request-id']
  if (typeof header === 'string' && REQUEST_ID.test(header)) return header
  return randomUUID()
}

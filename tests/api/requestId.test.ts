import { describe, it, expect } from 'vitest'
import { IncomingMessage } from 'node:http'
import { Socket } from 'node:net'
import { getRequestId } from '../../api/http/requestId.ts'

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i

function fakeRequest(headers: Record<string, string> = {}): IncomingMessage {
  const req = new IncomingMessage(new Socket())
  for (const [key, value] of Object.entries(headers)) req.headers[key.toLowerCase()] = value
  return req
}

describe('getRequestId', () => {
  it('reuses a well-formed caller id', () => {
    expect(getRequestId(fakeRequest({ 'X-Request-Id': 'trace-42.a:b' }))).toBe('trace-42.a:b')
  })

  it('generates a UUID when the header is missing', () => {
    expect(getRequestId(fakeRequest())).toMatch(UUID_RE)
  })

  it.each([
    ['', 'empty'],
    ['a b', 'whitespace'],
    ['<script>', 'markup'],
    ['x'.repeat(129), 'too long'],
  ])('replaces %j (%s)', (value) => {
    expect(getRequestId(fakeRequest({ 'x-request-id': value }))).toMatch(UUID_RE)
  })

  it('generates distinct ids', () => {
    expect(getRequestId(fakeRequest())).not.toBe(getRequestId(fakeRequest()))
  })
})

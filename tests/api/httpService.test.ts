import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import http from 'node:http'
import { createHttpService, MAX_BODY_SIZE } from '../../api/http/httpService.ts'
import type { HttpService } from '../../api/http/httpService.ts'
import { TranscriptService } from '../../api/service/TranscriptService.ts'
import { TranscriptStore } from '../../api/service/TranscriptStore.ts'
import { WI_TAXPAYER_2021 } from '../fixtures/transcripts.ts'

// ── Helpers ──────────────────────────────────────────────────────

interface Reply {
  status: number
  headers: http.IncomingHttpHeaders
  body: string
}

let store: TranscriptStore
let httpService: HttpService

function send(
  method: string,
  path: string,
  body?: string | Buffer[],
  headers: Record<string, string> = {},
  target: HttpService = httpService,
): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        hostname: '127.0.0.1',
        port: target.port,
        path,
        method,
        headers: body === undefined ? headers : { 'Content-Type': 'application/json', ...headers },
      },
      (res) => {
        let data = ''
        res.on('data', (chunk) => { data += chunk })
        res.on('end', () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body: data }))
      },
    )
    req.on('error', (err: NodeJS.ErrnoException) => {
      // The server may reset the socket once an oversized body is refused
      if (err.code === 'ECONNRESET' || err.code === 'EPIPE') {
        resolve({ status: 413, headers: {}, body: '{"error":"payload_too_large"}' })
      } else {
        reject(err)
      }
    })
    if (Array.isArray(body)) {
      for (const chunk of body) req.write(chunk)
      req.end()
    } else {
      req.end(body)
    }
  })
}

const get = (path: string, headers?: Record<string, string>) => send('GET', path, undefined, headers)
const post = (path: string, data: unknown, headers?: Record<string, string>) =>
  send('POST', path, JSON.stringify(data), headers)

beforeEach(async () => {
  store = new TranscriptStore(':memory:')
  httpService = createHttpService(new TranscriptService(store), {
    port: 0,
    corsOrigin: 'http://localhost:5173',
  })
  await httpService.start()
})

afterEach(async () => {
  await httpService.stop()
  store.close()
})

// ── Tests ────────────────────────────────────────────────────────

describe('routing', () => {
  it('reports health with the pattern count', async () => {
    const res = await get('/api/health')
    expect(res.status).toBe(200)
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8')
    expect(JSON.parse(res.body)).toEqual({ status: 'ok', patterns: 28 })
  })

  it('parses a transcript', async () => {
    const res = await post('/api/transcripts/parse', { fileName: 'WI 21 TP.pdf', text: WI_TAXPAYER_2021 })
    expect(res.status).toBe(200)
    const json = JSON.parse(res.body)
    expect(json.tax_year).toBe('2021')
    expect(json.tracking_number).toBe('123456789')
    expect(json.parsing_metadata.total_forms_found).toBe(2)
  })

  it('resolves an owner', async () => {
    const res = await post('/api/owners/resolve', { fileName: 'AT 22 E.pdf' })
    expect(JSON.parse(res.body)).toEqual({ fileName: 'AT 22 E.pdf', owner: 'S' })
  })

  it('returns 404 for unknown routes and methods', async () => {
    expect((await get('/api/nope')).status).toBe(404)
    expect((await get('/api/transcripts/parse')).status).toBe(404)
    expect(JSON.parse((await get('/api/cases/case-1/other')).body)).toEqual({ error: 'not_found' })
  })
})

describe('cases', () => {
  const request = { documents: [{ fileName: 'WI 21 TP.pdf', text: WI_TAXPAYER_2021 }] }

  it('analyzes a wage & income case and lists it afterwards', async () => {
    const res = await post('/api/cases/case-1/wage-income', request)
    expect(res.status).toBe(200)
    const json = JSON.parse(res.body)
    expect(json.case_id).toBe('case-1')
    expect(json.persisted).toBe(true)
    expect(json.years['2021'].summary.total_income).toBe(50733)

    const listed = JSON.parse((await get('/api/cases/case-1/analyses')).body)
    expect(listed.caseId).toBe('case-1')
    expect(listed.analyses).toHaveLength(1)
    expect(listed.analyses[0].kind).toBe('wage-income')
  })

  it('decodes the case id from the path', async () => {
    const res = await post('/api/cases/case%2E7/account', request)
    expect(JSON.parse(res.body).case_id).toBe('case.7')
  })

  it('rejects a malformed case id', async () => {
    const res = await post('/api/cases/bad%20id/wage-income', request)
    expect(res.status).toBe(400)
    expect(JSON.parse(res.body)).toEqual({ error: 'invalid_case_id' })
  })

  it('rejects a case without documents', async () => {
    const res = await post('/api/cases/case-1/wage-income', { documents: [] })
    expect(res.status).toBe(400)
    const json = JSON.parse(res.body)
    expect(json.error).toBe('validation_failed')
    expect(json.issues[0].path).toBe('documents')
  })
})

describe('feedback', () => {
  it('records feedback and serves statistics', async () => {
    const created = await post('/api/feedback', { extractionId: 'ext-1', patternId: 'W-2.wages', isCorrect: true })
    expect(created.status).toBe(201)
    expect(JSON.parse(created.body).patternId).toBe('W-2.wages')

    const stats = JSON.parse((await get('/api/feedback/stats')).body)
    expect(stats).toEqual({ patterns: [{ patternId: 'W-2.wages', attempts: 1, correct: 1, accuracy: 1 }] })
  })
})

describe('request bodies', () => {
  it('rejects invalid JSON', async () => {
    const res = await send('POST', '/api/owners/resolve', '{not json')
    expect(res.status).toBe(400)
    expect(JSON.parse(res.body)).toEqual({ error: 'invalid_json' })
  })

  it('lists validation issues by path', async () => {
    const res = await post('/api/transcripts/parse', { fileName: '' })
    expect(res.status).toBe(400)
    const json = JSON.parse(res.body)
    expect(json.error).toBe('validation_failed')
    expect(json.issues.map((i: { path: string }) => i.path)).toEqual(['fileName', 'text'])
  })

  it('rejects a declared Content-Length over the limit (413)', async () => {
    const res = await send('POST', '/api/transcripts/parse', '{}', { 'Content-Length': String(MAX_BODY_SIZE + 1) })
    expect(res.status).toBe(413)
    expect(JSON.parse(res.body)).toEqual({ error: 'payload_too_large' })
  })

  it('rejects a streamed body that grows past the limit (413)', async () => {
    const chunk = Buffer.alloc(1024 * 1024, 0x20)
    const res = await send('POST', '/api/transcripts/parse', Array.from({ length: 6 }, () => chunk), {
      'Transfer-Encoding': 'chunked',
    })
    expect(res.status).toBe(413)
  })

  it('times out a body that never finishes (408)', async () => {
    const slow = createHttpService(new TranscriptService(null), { port: 0, bodyTimeoutMs: 50 })
    await slow.start()
    try {
      const res = await new Promise<Reply>((resolve, reject) => {
        const req = http.request(
          {
            hostname: '127.0.0.1',
            port: slow.port,
            path: '/api/owners/resolve',
            method: 'POST',
            headers: { 'Content-Type': 'application/json', 'Transfer-Encoding': 'chunked' },
          },
          (response) => {
            let data = ''
            response.on('data', (c) => { data += c })
            response.on('end', () => resolve({ status: response.statusCode ?? 0, headers: response.headers, body: data }))
          },
        )
        req.on('error', reject)
        req.write('{"fileName":')
      })
      expect(res.status).toBe(408)
      expect(JSON.parse(res.body)).toEqual({ error: 'request_timeout' })
    } finally {
      await slow.stop()
    }
  })
})

describe('headers', () => {
  it('echoes a caller request id', async () => {
    const res = await get('/api/health', { 'X-Request-Id': 'trace-1' })
    expect(res.headers['x-request-id']).toBe('trace-1')
  })

  it('generates a request id otherwise', async () => {
    const res = await get('/api/health')
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('sets security headers on every response', async () => {
    const res = await get('/api/nope')
    expect(res.headers['x-content-type-options']).toBe('nosniff')
    expect(res.headers['cache-control']).toBe('no-store')
  })

  it('answers an allowed preflight with 204', async () => {
    const res = await send('OPTIONS', '/api/cases/case-1/wage-income', undefined, { Origin: 'http://localhost:5173' })
    expect(res.status).toBe(204)
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173')
  })

  it('refuses a preflight from another origin with 403', async () => {
    const res = await send('OPTIONS', '/api/health', undefined, { Origin: 'https://elsewhere.example' })
    expect(res.status).toBe(403)
    expect(res.headers['access-control-allow-origin']).toBeUndefined()
  })
})

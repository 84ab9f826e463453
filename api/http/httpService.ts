/**
 * HTTP front end of the transcript service (node:http, JSON only).
 *
 *   GET  /api/health
 *   POST /api/transcripts/parse           { fileName, text }
 *   POST /api/transcripts/text            { fileName, pdfBase64 }
 *   POST /api/owners/resolve              { fileName }
 *   POST /api/cases/:caseId/wage-income   { documents, filingStatus?, includeOwnerAnalysis? }
 *   POST /api/cases/:caseId/account       { documents, filingStatus?, includeOwnerAnalysis? }
 *   GET  /api/cases/:caseId/analyses
 *   POST /api/feedback                    { extractionId, patternId, isCorrect, correctValue?, comments? }
 *   GET  /api/feedback/stats
 *
 * Errors are `{ error: <code> }`; validation failures add `issues`.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import type { ZodType } from 'zod'
import {
  caseRequestSchema,
  feedbackRequestSchema,
  ownerRequestSchema,
  parseRequestSchema,
  pdfTextRequestSchema,
} from '../../src/model/schemas.ts'
import type { TranscriptService } from '../service/TranscriptService.ts'
import { TranscriptServiceError } from '../service/TranscriptService.ts'
import { errorContext, logger } from '../utils/logger.ts'
import { getRequestId } from './requestId.ts'
import { parseCorsOrigins, setCorsHeaders, setSecurityHeaders } from './securityHeaders.ts'

const log = logger.child({ component: 'http' })

const DEFAULT_PORT = 7891

/** Maximum request body size in bytes (5 MB). */
export const MAX_BODY_SIZE = 5 * 1024 * 1024

/** Time allowed for the whole request body to arrive. */
export const BODY_TIMEOUT_MS = 30_000

const CASE_ROUTE = /^\/api\/cases\/([^/]+)\/(wage-income|account|analyses)$/

export interface HttpServiceOptions {
  port?: number
  /** Comma-separated CORS allow-list; unset means same-origin only. */
  corsOrigin?: string
  bodyTimeoutMs?: number
}

export interface HttpService {
  start(): Promise<void>
  stop(): Promise<void>
  server: Server
  /** The bound port once started (differs from the option when 0 is passed). */
  port: number
}

type BodyResult = { ok: true; value: unknown } | { ok: false }

function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  if (res.headersSent) return
  res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' })
  res.end(JSON.stringify(data))
}

export function createHttpService(service: TranscriptService, options: HttpServiceOptions = {}): HttpService {
  const port = options.port ?? DEFAULT_PORT
  const bodyTimeoutMs = options.bodyTimeoutMs ?? BODY_TIMEOUT_MS
  const cors = parseCorsOrigins(options.corsOrigin)

  /** Reads and JSON-parses the body; on failure the error response has already been sent. */
  function readJsonBody(req: IncomingMessage, res: ServerResponse): Promise<BodyResult> {
    return new Promise((resolve) => {
      const contentLength = req.headers['content-length']
      if (contentLength != null && parseInt(contentLength, 10) > MAX_BODY_SIZE) {
        sendJson(res, { error: 'payload_too_large' }, 413)
        req.resume()
        resolve({ ok: false })
        return
      }

      const chunks: Buffer[] = []
      let bodySize = 0
      let done = false

      const fail = (status: number, error: string): void => {
        if (done) return
        done = true
        clearTimeout(timer)
        sendJson(res, { error }, status)
        resolve({ ok: false })
      }

      const timer = setTimeout(() => {
        fail(408, 'request_timeout')
        res.once('finish', () => req.destroy())
      }, bodyTimeoutMs)

      req.on('data', (chunk: Buffer) => {
        if (done) return
        bodySize += chunk.length
        if (bodySize > MAX_BODY_SIZE) {
          fail(413, 'payload_too_large')
          res.once('finish', () => req.destroy())
          return
        }
        chunks.push(chunk)
      })

      req.on('end', () => {
        if (done) return
        done = true
        clearTimeout(timer)
        try {
          const value: unknown = JSON.parse(Buffer.concat(chunks).toString('utf-8'))
          resolve({ ok: true, value })
        } catch (err) {
          log.warn('Invalid JSON in request body', errorContext(err))
          sendJson(res, { error: 'invalid_json' }, 400)
          resolve({ ok: false })
        }
      })

      req.on('error', (err) => {
        log.warn('Request stream error', errorContext(err))
        fail(400, 'bad_request')
      })
    })
  }

  /** Body validated against `schema`, or null once a 4xx has been sent. */
  async function readBody<T>(req: IncomingMessage, res: ServerResponse, schema: ZodType<T>): Promise<T | null> {
    const body = await readJsonBody(req, res)
    if (!body.ok) return null

    const parsed = schema.safeParse(body.value)
    if (!parsed.success) {
      sendJson(res, {
        error: 'validation_failed',
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }, 400)
      return null
    }
    return parsed.data
  }

  async function route(req: IncomingMessage, res: ServerResponse, path: string): Promise<void> {
    const method = req.method ?? 'GET'

    if (method === 'GET' && path === '/api/health') {
      sendJson(res, { status: 'ok', patterns: service.patternCount })
      return
    }

    if (method === 'POST' && path === '/api/transcripts/parse') {
      const body = await readBody(req, res, parseRequestSchema)
      if (body) sendJson(res, service.parseDocument(body))
      return
    }

    if (method === 'POST' && path === '/api/transcripts/text') {
      const body = await readBody(req, res, pdfTextRequestSchema)
      if (body) sendJson(res, await service.extractText(body.fileName, body.pdfBase64))
      return
    }

    if (method === 'POST' && path === '/api/owners/resolve') {
      const body = await readBody(req, res, ownerRequestSchema)
      if (body) sendJson(res, { fileName: body.fileName, owner: service.resolveOwner(body.fileName) })
      return
    }

    if (method === 'POST' && path === '/api/feedback') {
      const body = await readBody(req, res, feedbackRequestSchema)
      if (body) sendJson(res, service.recordFeedback(body), 201)
      return
    }

    if (method === 'GET' && path === '/api/feedback/stats') {
      sendJson(res, { patterns: service.patternStatistics() })
      return
    }

    const caseMatch = CASE_ROUTE.exec(path)
    if (caseMatch) {
      const [, rawCaseId, action] = caseMatch
      let caseId: string
      try {
        caseId = decodeURIComponent(rawCaseId)
      } catch {
        sendJson(res, { error: 'invalid_case_id' }, 400)
        return
      }

      if (method === 'GET' && action === 'analyses') {
        sendJson(res, { caseId, analyses: service.listAnalyses(caseId) })
        return
      }
      if (method === 'POST' && action === 'wage-income') {
        const body = await readBody(req, res, caseRequestSchema)
        if (body) sendJson(res, service.analyzeWageIncome(caseId, body))
        return
      }
      if (method === 'POST' && action === 'account') {
        const body = await readBody(req, res, caseRequestSchema)
        if (body) sendJson(res, service.analyzeAccount(caseId, body))
        return
      }
    }

    sendJson(res, { error: 'not_found' }, 404)
  }

  function handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const startTime = Date.now()
    const requestId = getRequestId(req)
    const url = new URL(req.url ?? '/', 'http://localhost')
    const path = url.pathname

    res.setHeader('X-Request-Id', requestId)
    setSecurityHeaders(req, res)
    const originAllowed = setCorsHeaders(req, res, cors)

    res.on('finish', () => {
      log.info('request', {
        requestId,
        method: req.method,
        path,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      })
    })

    if (req.method === 'OPTIONS') {
      res.writeHead(originAllowed ? 204 : 403)
      res.end()
      return
    }

    route(req, res, path).catch((err: unknown) => {
      if (err instanceof TranscriptServiceError) {
        sendJson(res, { error: err.code }, err.status)
        return
      }
      log.error('Unhandled request error', { requestId, path, ...errorContext(err) })
      sendJson(res, { error: 'internal_error' }, 500)
    })
  }

  const server = createServer(handleRequest)

  const svc: HttpService = {
    start() {
      return new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(port, () => {
          server.off('error', reject)
          const addr = server.address()
          if (addr && typeof addr === 'object') svc.port = addr.port
          resolve()
        })
      })
    },
    stop() {
      return new Promise<void>((resolve, reject) => {
        if (!server.listening) {
          resolve()
          return
        }
        server.close((err) => (err ? reject(err) : resolve()))
        server.closeAllConnections()
      })
    },
    server,
    port,
  }

  return svc
}

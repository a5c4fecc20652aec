/**
 * HTTP Fetcher Implementation
 *
 * Pooled undici dispatchers with bounded retries and a two-stage timeout:
 * - primary stage: connect 30s, read = configured timeout (default 120s)
 * - escalated stage: connect 60s, read 180s, used once after a read-timeout
 *
 * Never throws for network conditions; every outcome is a FetchResult.
 */

import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici'
import pLimit, { type LimitFunction } from 'p-limit'
import type { ILogger } from '@mangaku/logger'
import type { RequestCounter } from '../metrics.js'
import type {
  Fetcher,
  FetchFailureKind,
  FetchOptions,
  FetchRequest,
  FetchResult,
  RetryPolicy,
  TimeoutStage,
} from '../types.js'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_RETRY_POLICY,
  ESCALATED_TIMEOUTS,
  PRIMARY_CONNECT_TIMEOUT_MS,
} from '../types.js'

/** Response surface the fetcher reads. undici's Response satisfies it. */
export interface UpstreamResponse {
  status: number
  statusText: string
  headers: { get(name: string): string | null }
  text(): Promise<string>
}

export interface UpstreamRequestInit {
  method: 'GET'
  headers: Record<string, string>
  dispatcher: Dispatcher
  redirect: 'follow'
}

export type FetchImpl = (url: string, init: UpstreamRequestInit) => Promise<UpstreamResponse>

export interface HttpFetcherOptions {
  /** Read timeout for primary-stage attempts (default: 120000) */
  timeoutMs?: number

  /** Retry policy for retryable status codes */
  retryPolicy?: Partial<RetryPolicy>

  /** Connections kept per origin in each pool (default: 20) */
  poolSize?: number

  /** Upper bound on attempts in flight across both pools (default: 50) */
  poolMaxSize?: number

  /**
   * Skip TLS certificate validation. The target origin serves an invalid
   * chain, so the engine turns this on explicitly from configuration.
   */
  insecureTls?: boolean

  /** Counts every physical attempt */
  requestCounter?: RequestCounter

  logger?: ILogger

  /** Replaces undici's fetch (tests) */
  fetchImpl?: FetchImpl

  /** Replaces the backoff sleep (tests) */
  sleep?: (ms: number) => Promise<void>
}

const READ_TIMEOUT_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'])
const CONNECT_TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT'])

type AttemptOutcome =
  | { type: 'response'; statusCode: number; statusText: string; body: string; retryAfterMs?: number }
  | { type: 'failure'; kind: Exclude<FetchFailureKind, 'http_status'>; error: string; cause: unknown }

/**
 * HTTP fetcher backed by undici connection pools.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly primary: Agent
  private readonly escalated: Agent
  private readonly inFlight: LimitFunction
  private readonly fetchImpl: FetchImpl
  private readonly requestCounter?: RequestCounter
  private readonly log?: ILogger
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy }
    this.timeoutMs = options.timeoutMs ?? 120000
    this.requestCounter = options.requestCounter
    this.log = options.logger
    this.fetchImpl = options.fetchImpl ?? undiciFetch
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))

    const insecureTls = options.insecureTls ?? false
    const poolSize = options.poolSize ?? 20

    this.primary = createPool(poolSize, insecureTls, {
      connectTimeoutMs: PRIMARY_CONNECT_TIMEOUT_MS,
      readTimeoutMs: this.timeoutMs,
    })
    this.escalated = createPool(poolSize, insecureTls, ESCALATED_TIMEOUTS)
    this.inFlight = pLimit(options.poolMaxSize ?? 50)

    if (insecureTls) {
      this.log?.warn('FETCH_TLS_VERIFICATION_DISABLED', {
        reason: 'configured via insecureTls',
      })
    }
  }

  /**
   * Fetch a URL and return its body.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const request: FetchRequest = Object.freeze({
      url,
      timeoutMs: this.timeoutMs,
      maxRetries: options.maxRetries ?? this.retryPolicy.maxRetries,
    })
    const headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    const startTime = Date.now()

    let attempts = 0
    let escalationUsed = false
    let retriesLeft = request.maxRetries

    while (true) {
      attempts++
      let outcome = await this.attempt(request.url, headers, this.primary)

      if (outcome.type === 'failure' && outcome.kind === 'read_timeout' && !escalationUsed) {
        escalationUsed = true
        this.log?.warn('FETCH_ESCALATING_TIMEOUT', {
          url: request.url,
          attempt: attempts,
          readTimeoutMs: ESCALATED_TIMEOUTS.readTimeoutMs,
        })
        attempts++
        outcome = await this.attempt(request.url, headers, this.escalated)
      }

      if (outcome.type === 'failure') {
        this.log?.warn('FETCH_FAILED', { url: request.url, kind: outcome.kind, attempts, error: outcome.error })
        return {
          ok: false,
          kind: outcome.kind,
          error: outcome.error,
          cause: outcome.cause,
          durationMs: Date.now() - startTime,
          attempts,
        }
      }

      if (outcome.statusCode >= 200 && outcome.statusCode < 300) {
        return {
          ok: true,
          statusCode: outcome.statusCode,
          body: outcome.body,
          durationMs: Date.now() - startTime,
          attempts,
        }
      }

      const retryable = this.retryPolicy.retryableStatusCodes.includes(outcome.statusCode)
      if (retryable && retriesLeft > 0) {
        retriesLeft--
        const delay = this.backoffDelay(request.maxRetries - retriesLeft, outcome.retryAfterMs)
        this.log?.debug('FETCH_RETRY', { url: request.url, statusCode: outcome.statusCode, attempts, delayMs: delay })
        await this.sleep(delay)
        continue
      }

      return {
        ok: false,
        kind: 'http_status',
        statusCode: outcome.statusCode,
        error: `HTTP ${outcome.statusCode}: ${outcome.statusText}`,
        durationMs: Date.now() - startTime,
        attempts,
      }
    }
  }

  /**
   * Release pooled connections.
   */
  async close(): Promise<void> {
    await Promise.all([this.primary.close(), this.escalated.close()])
  }

  /**
   * Single physical attempt (no retries).
   */
  private attempt(url: string, headers: Record<string, string>, dispatcher: Dispatcher): Promise<AttemptOutcome> {
    return this.inFlight(async (): Promise<AttemptOutcome> => {
      this.requestCounter?.recordRequest()

      try {
        const response = await this.fetchImpl(url, {
          method: 'GET',
          headers,
          dispatcher,
          redirect: 'follow',
        })
        // Reading the body on every status returns the socket to the pool
        const body = await response.text()

        return {
          type: 'response',
          statusCode: response.status,
          statusText: response.statusText,
          body,
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        }
      } catch (error) {
        return {
          type: 'failure',
          kind: classifyTransportError(error),
          error: describeError(error),
          cause: error,
        }
      }
    })
  }

  private backoffDelay(retryNumber: number, retryAfterMs?: number): number {
    const exponential =
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, retryNumber - 1)
    return Math.min(Math.max(exponential, retryAfterMs ?? 0), this.retryPolicy.maxDelayMs)
  }
}

function createPool(connections: number, insecureTls: boolean, stage: TimeoutStage): Agent {
  return new Agent({
    connections,
    connect: {
      timeout: stage.connectTimeoutMs,
      rejectUnauthorized: !insecureTls,
    },
    headersTimeout: stage.readTimeoutMs,
    bodyTimeout: stage.readTimeoutMs,
  })
}

/**
 * Map an error thrown by undici to a failure kind.
 * undici wraps socket errors in `TypeError: fetch failed` with the real
 * error as `cause`, so the whole cause chain is inspected.
 */
/**
 * A socket-level ETIMEDOUT is a connect timeout only when raised by the
 * `connect` syscall; on an open socket it is a slow read.
 */
export function classifyTransportError(error: unknown): Exclude<FetchFailureKind, 'http_status'> {
  for (const { code, syscall } of errorCodes(error)) {
    if (READ_TIMEOUT_CODES.has(code)) return 'read_timeout'
    if (CONNECT_TIMEOUT_CODES.has(code)) return 'connect_timeout'
    if (code === 'ETIMEDOUT') return syscall === 'connect' ? 'connect_timeout' : 'read_timeout'
  }
  return 'transport_error'
}

function errorCodes(error: unknown): Array<{ code: string; syscall?: string }> {
  const codes: Array<{ code: string; syscall?: string }> = []
  let current: unknown = error
  for (let depth = 0; depth < 4 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      const syscall = 'syscall' in current && typeof current.syscall === 'string' ? current.syscall : undefined
      codes.push({ code: current.code, syscall })
    }
    current = 'cause' in current ? current.cause : undefined
  }
  return codes
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error)
  const cause = error.cause
  return cause instanceof Error ? `${error.message}: ${cause.message}` : error.message
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined
  const seconds = Number.parseInt(value, 10)
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined
}

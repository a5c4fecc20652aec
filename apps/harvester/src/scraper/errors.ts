/**
 * Failure Classification
 *
 * Every engine operation resolves to a ScrapeOutcome. Failures fall into two
 * categories that outer layers map to their own responses:
 * - not_found: the requested entity does not exist upstream
 * - server_failure: the transport or the upstream server failed
 *
 * Messages are diagnostic. Nothing here is meant for end users.
 */

import type { FetchFailure } from './types.js'

export type FailureCategory = 'not_found' | 'server_failure'

export const FAILURE_CODES = {
  NOT_FOUND: 'NOT_FOUND',
  MANDATORY_FIELD_MISSING: 'MANDATORY_FIELD_MISSING',
  UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',
  UPSTREAM_UNREACHABLE: 'UPSTREAM_UNREACHABLE',
  UPSTREAM_HTTP_ERROR: 'UPSTREAM_HTTP_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type FailureCode = (typeof FAILURE_CODES)[keyof typeof FAILURE_CODES]

export interface ScrapeFailure {
  category: FailureCategory
  code: FailureCode
  message: string
  suspectedCause?: string
  statusCode?: number
  isRetryable: boolean
}

export type ScrapeOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ScrapeFailure }

export function succeed<T>(value: T): ScrapeOutcome<T> {
  return { ok: true, value }
}

export function fail<T>(failure: ScrapeFailure): ScrapeOutcome<T> {
  return { ok: false, failure }
}

const NOT_FOUND_STATUS_CODES = new Set([404, 410])

/**
 * Map a transport failure to the failure surface.
 */
export function classifyFetchFailure(result: FetchFailure, url: string): ScrapeFailure {
  switch (result.kind) {
    case 'connect_timeout':
      return {
        category: 'server_failure',
        code: FAILURE_CODES.UPSTREAM_TIMEOUT,
        message: `Connecting to upstream timed out: ${url}`,
        suspectedCause: 'upstream host unreachable or overloaded',
        isRetryable: true,
      }
    case 'read_timeout':
      return {
        category: 'server_failure',
        code: FAILURE_CODES.UPSTREAM_TIMEOUT,
        message: `Upstream did not answer in time after escalation: ${url}`,
        suspectedCause: 'upstream responding too slowly',
        isRetryable: true,
      }
    case 'transport_error':
      return {
        category: 'server_failure',
        code: FAILURE_CODES.UPSTREAM_UNREACHABLE,
        message: `Request to upstream failed: ${result.error}`,
        suspectedCause: 'network or TLS error',
        isRetryable: true,
      }
    case 'http_status': {
      const statusCode = result.statusCode
      if (statusCode !== undefined && NOT_FOUND_STATUS_CODES.has(statusCode)) {
        return {
          category: 'not_found',
          code: FAILURE_CODES.NOT_FOUND,
          message: `Upstream returned ${statusCode} for ${url}`,
          statusCode,
          isRetryable: false,
        }
      }
      return {
        category: 'server_failure',
        code: FAILURE_CODES.UPSTREAM_HTTP_ERROR,
        message: `Upstream returned ${statusCode ?? 'an error'} for ${url}`,
        suspectedCause: result.error,
        statusCode,
        isRetryable: statusCode === undefined || statusCode >= 500 || statusCode === 429,
      }
    }
  }
}

/**
 * The page loaded but the anchor every record depends on (the title) is absent.
 */
export function mandatoryFieldMissing(field: string, url: string): ScrapeFailure {
  return {
    category: 'not_found',
    code: FAILURE_CODES.MANDATORY_FIELD_MISSING,
    message: `Mandatory field "${field}" missing on ${url}`,
    suspectedCause: 'entity does not exist or page structure changed',
    isRetryable: false,
  }
}

/**
 * Classify anything thrown inside an engine operation.
 */
export function classifyUnexpectedError(error: unknown): ScrapeFailure {
  if (error instanceof Error) {
    return {
      category: 'server_failure',
      code: FAILURE_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      suspectedCause: error.name,
      isRetryable: false,
    }
  }

  return {
    category: 'server_failure',
    code: FAILURE_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}

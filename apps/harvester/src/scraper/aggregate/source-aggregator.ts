/**
 * Multi-Source Aggregator
 *
 * Reader pages embed up to three mirror image sets. Each mirror is extracted
 * by its own task in a task group created for one call:
 * - at most `maxSources` sources, run with at most `concurrency` in flight
 * - a task that throws or outlives `taskTimeoutMs` yields [] for its label
 * - whatever has not finished after `overallTimeoutMs` yields [] as well
 *
 * Every expected label is always present in the result. Abandoned tasks are
 * not cancelled; only the wait for them ends.
 */

import pLimit from 'p-limit'
import type { ILogger } from '@mangaku/logger'
import type { PerSourceImages, SourceLabel } from '../types.js'
import { extractSourceImages } from './reader-source.js'

export type SourceTask = (descriptor: unknown, index: number) => string[] | Promise<string[]>

export interface SourceAggregatorOptions {
  maxSources?: number
  concurrency?: number
  taskTimeoutMs?: number
  overallTimeoutMs?: number
  logger?: ILogger
}

export type SourceFailureReason = 'error' | 'timeout'

export interface SourceFailure {
  label: SourceLabel
  reason: SourceFailureReason
  error?: string
}

export interface AggregationReport {
  images: PerSourceImages
  failures: SourceFailure[]
  durationMs: number
}

type TaskOutcome =
  | { type: 'done'; images: string[] }
  | { type: 'error'; error: unknown }
  | { type: 'timeout' }

export const DEFAULT_MAX_SOURCES = 3
const DEFAULT_CONCURRENCY = 3
const DEFAULT_TASK_TIMEOUT_MS = 10_000
const DEFAULT_OVERALL_TIMEOUT_MS = 30_000

export function sourceLabel(index: number): SourceLabel {
  return `Server ${index + 1}`
}

/**
 * Labels a caller can rely on: one per source up to `maxSources`, or all of
 * them when the page exposed no source at all.
 */
export function expectedLabels(sourceCount: number, maxSources = DEFAULT_MAX_SOURCES): SourceLabel[] {
  const count = sourceCount > 0 ? Math.min(sourceCount, maxSources) : maxSources
  return Array.from({ length: count }, (_, index) => sourceLabel(index))
}

export class SourceAggregator {
  readonly maxSources: number
  private readonly concurrency: number
  private readonly taskTimeoutMs: number
  private readonly overallTimeoutMs: number
  private readonly log?: ILogger

  constructor(options: SourceAggregatorOptions = {}) {
    this.maxSources = options.maxSources ?? DEFAULT_MAX_SOURCES
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.taskTimeoutMs = options.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS
    this.overallTimeoutMs = options.overallTimeoutMs ?? DEFAULT_OVERALL_TIMEOUT_MS
    this.log = options.logger
  }

  async aggregate(sources: readonly unknown[], task: SourceTask = extractSourceImages): Promise<PerSourceImages> {
    const report = await this.run(sources, task)
    return report.images
  }

  /**
   * Same as aggregate(), plus which labels failed and why.
   */
  async run(sources: readonly unknown[], task: SourceTask = extractSourceImages): Promise<AggregationReport> {
    const startTime = Date.now()
    const selected = sources.slice(0, this.maxSources)
    const labels = expectedLabels(selected.length, this.maxSources)

    const images: PerSourceImages = {}
    for (const label of labels) {
      images[label] = []
    }

    const failures: SourceFailure[] = []
    const finished = new Set<SourceLabel>()
    const timers = new Set<NodeJS.Timeout>()
    let closed = false

    const limit = pLimit(this.concurrency)

    const jobs = selected.map((descriptor, index) => {
      const label = sourceLabel(index)
      return limit(() => this.runTask(() => task(descriptor, index), timers)).then(outcome => {
        if (closed) return
        finished.add(label)
        if (outcome.type === 'done') {
          images[label] = outcome.images
          return
        }
        const failure: SourceFailure =
          outcome.type === 'timeout'
            ? { label, reason: 'timeout' }
            : { label, reason: 'error', error: describe(outcome.error) }
        failures.push(failure)
        this.log?.warn('AGGREGATE_SOURCE_FAILED', { ...failure, timeoutMs: this.taskTimeoutMs })
      })
    })

    const completed = await Promise.race([
      Promise.all(jobs).then(() => true),
      this.delay(this.overallTimeoutMs, timers).then(() => false),
    ])

    closed = true
    limit.clearQueue()
    for (const timer of timers) {
      clearTimeout(timer)
    }
    timers.clear()

    if (!completed) {
      for (const label of labels.slice(0, selected.length)) {
        if (finished.has(label)) continue
        failures.push({ label, reason: 'timeout' })
        this.log?.warn('AGGREGATE_SOURCE_ABANDONED', { label, overallTimeoutMs: this.overallTimeoutMs })
      }
    }

    return {
      images: { ...images },
      failures,
      durationMs: Date.now() - startTime,
    }
  }

  private runTask(invoke: () => string[] | Promise<string[]>, timers: Set<NodeJS.Timeout>): Promise<TaskOutcome> {
    const work: Promise<TaskOutcome> = Promise.resolve()
      .then(invoke)
      .then(
        (images): TaskOutcome => ({ type: 'done', images }),
        (error: unknown): TaskOutcome => ({ type: 'error', error })
      )

    return new Promise<TaskOutcome>(resolve => {
      const timer = setTimeout(() => {
        timers.delete(timer)
        resolve({ type: 'timeout' })
      }, this.taskTimeoutMs)
      timers.add(timer)

      void work.then(outcome => {
        clearTimeout(timer)
        timers.delete(timer)
        resolve(outcome)
      })
    })
  }

  private delay(ms: number, timers: Set<NodeJS.Timeout>): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        timers.delete(timer)
        resolve()
      }, ms)
      timers.add(timer)
    })
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

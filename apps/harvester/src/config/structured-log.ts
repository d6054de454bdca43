/**
 * Structured logging helpers for harvest runs.
 *
 * Adds the run envelope (workflow, stage, runId) to every entry and keeps
 * full URLs out of the logs: listing URLs carry query strings we do not
 * need to retain.
 */

import { createHash } from 'crypto'
import type { ILogger } from '@cover-harvest/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  adapterId?: string
  attempt?: number
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface WorkflowLogger {
  debug: (event: string, meta?: LogMeta) => void
  info: (event: string, meta?: LogMeta) => void
  warn: (event: string, meta?: LogMeta, err?: unknown) => void
  error: (event: string, meta?: LogMeta, err?: unknown) => void
  fatal: (event: string, meta?: LogMeta, err?: unknown) => void
  child: (extra: Partial<WorkflowContext>) => WorkflowLogger
  /** Underlying logger carrying the same envelope, for components that take an ILogger */
  base: ILogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)
  const scoped = base.child(baseContext)

  const withEvent = (event: string, meta?: LogMeta) => ({
    event_name: event,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => scoped.debug(event, withEvent(event, meta)),
    info: (event, meta) => scoped.info(event, withEvent(event, meta)),
    warn: (event, meta, err) => scoped.warn(event, withEvent(event, meta), err),
    error: (event, meta, err) => scoped.error(event, withEvent(event, meta), err),
    fatal: (event, meta, err) => scoped.fatal(event, withEvent(event, meta), err),
    child: extra => createWorkflowLogger(base, { ...context, ...extra }),
    base: scoped,
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}

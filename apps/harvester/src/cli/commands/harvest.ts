import type { EventEmitter } from 'events'
import type { HarvestConfig } from '../../config/settings.js'
import { loadConfig } from '../../config/settings.js'
import { ConfigurationError, PipelineAbortedError } from '../../lib/errors.js'
import { buildSeeds, createPipeline, resolveAdapter } from '../../scraper/harvest.js'
import type { HarvestDependencies } from '../../scraper/harvest.js'
import type { Pipeline, PipelineSeed } from '../../scraper/pipeline.js'
import type { RunReport } from '../../scraper/types.js'
import type { ParsedFlags } from '../parse-flags.js'
import { asList, asString } from '../parse-flags.js'

export interface HarvestCommandArgs {
  flags: ParsedFlags
  env?: NodeJS.ProcessEnv
  /** Receives SIGINT; defaults to the process */
  signals?: EventEmitter
  deps?: HarvestDependencies
  print?: (line: string) => void
  printError?: (line: string) => void
}

/**
 * CLI flags mapped onto configuration fields. Values stay raw; the
 * config schema coerces and validates them.
 */
export function flagsToOverrides(flags: ParsedFlags): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}

  const scalars: Array<[string, string]> = [
    ['pages', 'pages'],
    ['max-pages', 'maxPages'],
    ['concurrency', 'concurrency'],
    ['search-term', 'searchTerm'],
    ['base-url', 'baseUrl'],
    ['output-dir', 'outputDir'],
    ['timeout', 'requestTimeoutMs'],
  ]
  for (const [flag, field] of scalars) {
    const value = asString(flags[flag])
    if (value !== undefined) overrides[field] = value
  }

  const urls = asList(flags.url)
  if (urls) overrides.seedUrls = urls

  const formats = asList(flags.format)
  if (formats) overrides.outputFormats = formats

  return overrides
}

export function formatReport(report: RunReport): string[] {
  const { summary } = report
  const lines = [
    `Run ${report.runId} ${report.state} in ${report.durationMs}ms`,
    `  records:   ${summary.finalRecordCount} (deduplicated ${summary.deduplicated})`,
    `  fetched:   ${summary.fetched} attempts, ${summary.succeeded} ok, ${summary.failed} failed, ${summary.retried} retried`,
    `  pages:     ${summary.discovered} discovered, ${summary.skipped} skipped, ${summary.dropped} dropped`,
  ]
  for (const write of report.writes) {
    lines.push(
      write.ok
        ? `  ${write.format}: ${write.path ?? ''} (${write.rows ?? 0} rows)`
        : `  ${write.format}: FAILED ${write.error ?? ''}`
    )
  }
  return lines
}

/**
 * @returns exit code: 0 success, 1 writer failure or aborted run, 2 invalid input
 */
export async function runHarvestCommand(args: HarvestCommandArgs): Promise<number> {
  const print = args.print ?? console.log
  const printError = args.printError ?? console.error
  const signals: EventEmitter = args.signals ?? process

  let config: HarvestConfig
  try {
    config = loadConfig(flagsToOverrides(args.flags), args.env ?? process.env)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(error.message)
      return 2
    }
    throw error
  }

  let pipeline: Pipeline
  let seeds: PipelineSeed[]
  try {
    const adapter = args.deps?.adapter ?? resolveAdapter(config.baseUrl)
    pipeline = createPipeline(config, { ...args.deps, adapter })
    seeds = buildSeeds(config, adapter)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(error.message)
      return 2
    }
    throw error
  }

  let interrupts = 0
  const onInterrupt = () => {
    interrupts++
    if (interrupts === 1) {
      printError('Stopping after in-flight pages finish (Ctrl-C again to stop now)')
      pipeline.shutdown({ force: false })
    } else {
      printError('Stopping now')
      pipeline.shutdown({ force: true })
    }
  }
  signals.on('SIGINT', onInterrupt)

  try {
    const report = await pipeline.run(seeds)
    for (const line of formatReport(report)) print(line)
    return report.writes.every(write => write.ok) ? 0 : 1
  } catch (error) {
    if (error instanceof PipelineAbortedError) {
      printError(error.message)
      for (const line of formatReport(error.report)) print(line)
      return 1
    }
    throw error
  } finally {
    signals.off('SIGINT', onInterrupt)
  }
}

import '../env.js'
import { runHarvestCommand } from './commands/harvest.js'
import { parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Car cover harvester')
  console.log('')
  console.log('Commands:')
  console.log('  harvest [--pages n] [--max-pages n] [--concurrency n] [--search-term s]')
  console.log('          [--url u ...] [--output-dir d] [--format csv,parquet] [--timeout ms]')
  console.log('')
  console.log('Environment: HARVEST_* variables set defaults, LOG_LEVEL / LOG_FORMAT control logging.')
  console.log('Ctrl-C once stops after in-flight pages; twice stops immediately.')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest, { multiple: ['url'] })
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'harvest':
      exitCode = await runHarvestCommand({ flags })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})

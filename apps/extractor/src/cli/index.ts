import '../env.js'
import { setLogLevel } from '@pagesift/logger'
import { loggers } from '../config/logger.js'
import { ConfigurationError, classifyError } from '../engine/errors.js'
import { DEFAULT_BASE_NAME, runRunCommand } from './commands/run.js'
import { runValidateCommand } from './commands/validate.js'
import { EXIT_CODES, type ExitCode } from './exit-codes.js'
import { asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('pagesift: extract fields from web pages into xlsx, csv and json')
  console.log('')
  console.log('Commands:')
  console.log('  run [--config <path>] [--fields <path>] --url <url> | --url-file <path>')
  console.log('      [--out <base name>] [--output-dir <dir>] [--formats xlsx,csv,json] [--headless]')
  console.log('  validate [--config <path>] [--fields <path>]')
  console.log('')
  console.log('Options:')
  console.log('  -c, --config      Run configuration (YAML or JSON)')
  console.log('  -f, --fields      Field configuration (YAML or JSON); bundled sample when omitted')
  console.log('  -u, --url         Single URL, processed before the URL file')
  console.log('  -U, --url-file    Text file with one URL per line (# comments allowed)')
  console.log(`  -o, --out         Output file base name (default: ${DEFAULT_BASE_NAME})`)
  console.log('  --verbose         Debug logging')
  console.log('  --quiet           Errors only')
}

async function main(): Promise<ExitCode> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return EXIT_CODES.OK
  }

  const flags = parseFlags(rest)
  if (flags.help === true) {
    printHelp()
    return EXIT_CODES.OK
  }
  if (flags.verbose === true) {
    setLogLevel('debug')
  } else if (flags.quiet === true) {
    setLogLevel('error')
  }

  const log = loggers.cli

  try {
    switch (command) {
      case 'run': {
        const controller = new AbortController()
        process.once('SIGINT', () => {
          log.warn('Interrupted, stopping after the current URL')
          controller.abort()
        })
        return await runRunCommand({
          configPath: asString(flags.config) || undefined,
          fieldsPath: asString(flags.fields) || undefined,
          url: asString(flags.url) || undefined,
          urlFile: asString(flags['url-file']) || undefined,
          baseName: asString(flags.out) || DEFAULT_BASE_NAME,
          outputDir: asString(flags['output-dir']) || undefined,
          formats: asString(flags.formats) || undefined,
          headless: flags.headless === true ? true : undefined,
          signal: controller.signal,
        })
      }
      case 'validate':
        return await runValidateCommand({
          configPath: asString(flags.config) || undefined,
          fieldsPath: asString(flags.fields) || undefined,
        })
      default:
        console.error(`Unknown command: ${command}`)
        printHelp()
        return EXIT_CODES.USAGE
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error('Configuration error', { code: error.code })
      console.error(error.message)
      return EXIT_CODES.USAGE
    }
    throw error
  }
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(error => {
    const classified = classifyError(error)
    loggers.cli.fatal('Unexpected error', { code: classified.code }, error)
    process.exit(EXIT_CODES.UNEXPECTED)
  })

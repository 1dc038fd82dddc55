#!/usr/bin/env node
import { Command } from 'commander'
import pc from 'picocolors'

import { displayError } from './display.js'
import { run } from './run.js'
import type { CliOptions } from './config.js'
import { isDebugEnabled } from '../utils/debug.js'

const VERSION = '0.1.0'

const program = new Command()
  .name('linkdeck')
  .description('Browse SSH, MySQL, PostgreSQL and Redis connections from the terminal')
  .version(VERSION, '-V, --version', 'Print version')
  .option('-c, --config <file>', 'Path to config file')
  .option('--catalog <file>', 'Connection catalog (JSON or YAML)')
  .option('-m, --module <name>', 'Module to open at startup')
  .option('--log-file <file>', 'Append log output to a file')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (options: CliOptions) => {
    try {
      await run(options)
      process.exit(0)
    } catch (error) {
      displayError(error instanceof Error ? error : new Error(String(error)), { stack: isDebugEnabled() })
      process.exit(1)
    }
  })

// Add examples to help
program.addHelpText(
  'after',
  `
${pc.bold('Examples:')}
  ${pc.dim('$')} linkdeck                              ${pc.dim('# Open the bundled catalog')}
  ${pc.dim('$')} linkdeck --module mysql               ${pc.dim('# Start on the MySQL module')}
  ${pc.dim('$')} linkdeck --catalog ./servers.yaml     ${pc.dim('# Use your own catalog')}
  ${pc.dim('$')} linkdeck --debug --log-file deck.log  ${pc.dim('# Write debug logs to a file')}

${pc.bold('Environment:')}
  LINKDECK_CATALOG, LINKDECK_MODULE, LINKDECK_LOG_FILE, LINKDECK_DEBUG
`
)

await program.parseAsync()

/**
 * greedy-regex command line.
 * @packageDocumentation
 */

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { runMatch, runSuggest, type Output } from './commands'
import { createConsoleIO, runSession } from './session'

const STRATEGY_CHOICES = ['greedy', 'backtracking'] as const

const consoleOutput: Output = {
  print: (line) => console.log(line),
  warn: (line) => console.error(line),
}

yargs(hideBin(process.argv))
  .scriptName('greedy-regex')
  .option('strategy', {
    describe: 'matching strategy',
    choices: STRATEGY_CHOICES,
    default: 'greedy' as const,
  })
  .command(
    '$0',
    'start an interactive session',
    (y) => y,
    async (argv) => {
      const io = createConsoleIO()
      try {
        await runSession(io, { strategy: argv.strategy })
      } finally {
        io.close()
      }
    },
  )
  .command(
    'match <pattern> <text>',
    'test whether a string is matched in full by a pattern',
    (y) =>
      y
        .positional('pattern', { describe: 'pattern to compile', type: 'string', demandOption: true })
        .positional('text', { describe: 'string to match', type: 'string', demandOption: true })
        .option('warnings', { describe: 'print pattern diagnostics to stderr', type: 'boolean', default: false }),
    (argv) => {
      const options = { strategy: argv.strategy, warnings: argv.warnings }
      if (!runMatch(argv.pattern, argv.text, options, consoleOutput)) {
        process.exitCode = 1
      }
    },
  )
  .command(
    'suggest <input>',
    'suggest a conventional regex for a sample string',
    (y) => y.positional('input', { describe: 'sample string', type: 'string', demandOption: true }),
    (argv) => {
      runSuggest(argv.input, consoleOutput)
    },
  )
  .strict()
  .help()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })

/**
 * Interactive session - a menu loop over matching and suggestion.
 * @packageDocumentation
 */

import { createInterface } from 'readline'
import { compile, suggestPattern } from '@greedy-regex/core'
import type { EngineOptions } from '@greedy-regex/core'
import { describeMatch } from './commands'

/**
 * Prompt-and-print I/O for a session.
 */
export interface SessionIO {
  /** Ask a question; resolves undefined once input has ended */
  ask(question: string): Promise<string | undefined>
  print(line: string): void
}

export const MENU: readonly string[] = [
  '',
  'Options:',
  '1. Match a string with a pattern',
  '2. Suggest a pattern for a string',
  '3. Exit',
]

export const SUGGEST_HINTS: readonly string[] = [
  '',
  'Enter a string in one of the following formats:',
  ' - URL (e.g., https://example.com)',
  ' - Email (e.g., user@example.com)',
  ' - Phone number (e.g., (123) 456-7890)',
  ' - ZIP code (e.g., 12345 or 12345-6789)',
]

export const INVALID_CHOICE = 'Invalid choice. Please enter 1, 2, or 3.'

/**
 * Run the menu loop until the user exits or input ends.
 */
export async function runSession(io: SessionIO, options: EngineOptions = {}): Promise<void> {
  for (;;) {
    MENU.forEach((line) => io.print(line))

    const choice = await io.ask('Select an option (1/2/3): ')
    if (choice === undefined) {
      return
    }

    switch (choice.trim()) {
      case '1': {
        const pattern = await io.ask('Enter a pattern: ')
        if (pattern === undefined) return
        const text = await io.ask('Enter a string to match: ')
        if (text === undefined) return

        io.print(describeMatch(pattern, text, compile(pattern, options).match(text)))
        break
      }

      case '2': {
        SUGGEST_HINTS.forEach((line) => io.print(line))
        const input = await io.ask('\nEnter your string: ')
        if (input === undefined) return

        const suggestion = suggestPattern(input)
        io.print('')
        io.print(`Suggested pattern (${suggestion.kind}): ${suggestion.pattern}`)
        break
      }

      case '3':
        io.print('Goodbye!')
        return

      default:
        io.print(INVALID_CHOICE)
    }
  }
}

/**
 * Session I/O over a pair of streams, stdin/stdout by default.
 *
 * Lines are read through one async iterator, so lines that arrive together
 * (piped input) are buffered until asked for.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): SessionIO & { close(): void } {
  const rl = createInterface({ input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()

  return {
    async ask(question: string): Promise<string | undefined> {
      output.write(question)
      const next = await lines.next()
      return next.done ? undefined : next.value
    },
    print(line: string): void {
      output.write(line + '\n')
    },
    close(): void {
      rl.close()
    },
  }
}

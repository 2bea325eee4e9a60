/**
 * Line-oriented output channels for command handlers
 */
export interface CommandIO {
  stdout(line: string): void
  stderr(line: string): void
}

export const processIO: CommandIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`)
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`)
  },
}

export const EXIT_CODES = {
  OK: 0,
  FAULT: 1, // machine ended in ERRORED, or the program failed to decode
  USAGE: 2, // unreadable input or invalid arguments
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

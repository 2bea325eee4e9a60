#!/usr/bin/env tsx

import { logger } from '@accuvm/core'
import { Command } from 'commander'
import { createDisasmCommand } from './commands/disasm'
import { EXIT_CODES, processIO } from './commands/io'
import { createRunCommand, type RunDefaults } from './commands/run'
import { loadCliEnv } from './env'

function createProgram(defaults: RunDefaults): Command {
  return new Command('accuvm')
    .description('Accumulator machine runner')
    .version('0.1.0')
    .addCommand(createRunCommand(defaults))
    .addCommand(createDisasmCommand())
}

const [envError, env] = loadCliEnv()

if (envError) {
  processIO.stderr(envError.message)
  process.exitCode = EXIT_CODES.USAGE
} else {
  // Initialize logger
  logger.init(env.LOG_LEVEL)

  createProgram({ maxSteps: env.ACCUVM_MAX_STEPS })
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error('accuvm failed', error)
      process.exitCode = EXIT_CODES.FAULT
    })
}

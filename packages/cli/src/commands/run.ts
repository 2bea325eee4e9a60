import { readFile } from 'node:fs/promises'
import { logger } from '@accuvm/core'
import {
  AccumulatorMachine,
  faultToString,
  formatMachine,
  MACHINE_STATUS,
} from '@accuvm/machine'
import { type Safe, safeError, safeTry } from '@accuvm/types'
import { Command } from 'commander'
import {
  parseMaxSteps,
  parseMemoryJson,
  parseMemoryList,
} from '../utils/validation'
import { type CommandIO, EXIT_CODES, type ExitCode, processIO } from './io'

export interface RunOptions {
  memory?: string
  memoryFile?: string
  maxSteps?: string
  dump?: boolean
  trace?: boolean
}

export interface RunDefaults {
  /** Step budget used when --max-steps is absent */
  maxSteps?: number
}

export function createRunCommand(defaults: RunDefaults = {}): Command {
  const command = new Command('run')
    .description('Load a program and run it to completion')
    .argument('<program>', 'Program source file')
    .option('-m, --memory <values>', 'Initial data memory as comma-separated integers')
    .option('--memory-file <path>', 'Initial data memory as a JSON array of integers')
    .option('--max-steps <n>', 'Stop with an error after this many instructions')
    .option('--dump', 'Print the final machine state')
    .option('--trace', 'Print the execution trace')
    .action(async (program: string, options: RunOptions) => {
      process.exitCode = await executeRunCommand(
        program,
        options,
        processIO,
        defaults,
      )
    })

  return command
}

async function resolveMemory(options: RunOptions): Promise<Safe<bigint[]>> {
  if (options.memory !== undefined && options.memoryFile !== undefined) {
    return safeError(new Error('--memory and --memory-file cannot be combined'))
  }

  if (options.memoryFile !== undefined) {
    const [readError, text] = await safeTry(readFile(options.memoryFile, 'utf8'))
    if (readError) {
      return safeError(
        new Error(`Unable to read memory file: ${options.memoryFile}`),
      )
    }
    return parseMemoryJson(text)
  }

  return parseMemoryList(options.memory ?? '')
}

function resolveMaxSteps(
  options: RunOptions,
  defaults: RunDefaults,
): Safe<number | undefined> {
  if (options.maxSteps === undefined) {
    return [undefined, defaults.maxSteps]
  }
  return parseMaxSteps(options.maxSteps)
}

/**
 * Run a program file and report the outcome as an exit code.
 * Every OUTPUT value is written to stdout on its own line.
 */
export async function executeRunCommand(
  programPath: string,
  options: RunOptions,
  io: CommandIO = processIO,
  defaults: RunDefaults = {},
): Promise<ExitCode> {
  const [memoryError, memory] = await resolveMemory(options)
  if (memoryError) {
    io.stderr(memoryError.message)
    return EXIT_CODES.USAGE
  }

  const [stepsError, maxSteps] = resolveMaxSteps(options, defaults)
  if (stepsError) {
    io.stderr(stepsError.message)
    return EXIT_CODES.USAGE
  }

  const machine = new AccumulatorMachine({
    output: (value) => io.stdout(value.toString()),
    maxSteps,
    trace: options.trace ?? false,
  })

  const [sourceError] = machine.loadFile(programPath, memory)
  if (sourceError) {
    io.stderr(sourceError.message)
    return EXIT_CODES.USAGE
  }

  const status = machine.run()
  logger.debug('Program finished', { program: programPath, status })

  if (options.trace) {
    for (const entry of machine.getExecutionLogs()) {
      io.stdout(
        `step ${entry.step}: [${entry.cursor}] ${entry.instruction} -> ${entry.accumulator}`,
      )
    }
  }

  if (options.dump) {
    io.stdout(formatMachine(machine.getSnapshot()))
  }

  const fault = machine.getFault()
  if (status === MACHINE_STATUS.ERRORED && fault) {
    io.stderr(`Fault: ${faultToString(fault)}`)
    return EXIT_CODES.FAULT
  }

  return EXIT_CODES.OK
}

import { readFile } from 'node:fs/promises'
import { formatListing, ProgramDecoder } from '@accuvm/machine'
import { safeTry } from '@accuvm/types'
import { Command } from 'commander'
import { type CommandIO, EXIT_CODES, type ExitCode, processIO } from './io'

export function createDisasmCommand(): Command {
  const command = new Command('disasm')
    .description('Decode a program and print its numbered instruction listing')
    .argument('<program>', 'Program source file')
    .action(async (program: string) => {
      process.exitCode = await executeDisasmCommand(program)
    })

  return command
}

export async function executeDisasmCommand(
  programPath: string,
  io: CommandIO = processIO,
  decoder: ProgramDecoder = new ProgramDecoder(),
): Promise<ExitCode> {
  const [readError, source] = await safeTry(readFile(programPath, 'utf8'))
  if (readError) {
    io.stderr(`Unable to read program source: ${programPath}`)
    return EXIT_CODES.USAGE
  }

  const [decodeError, instructions] = decoder.decode(source)
  if (decodeError) {
    io.stderr(decodeError.message)
    return EXIT_CODES.FAULT
  }

  for (const line of formatListing(instructions)) {
    io.stdout(line)
  }
  return EXIT_CODES.OK
}

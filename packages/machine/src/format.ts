/**
 * Formatting helpers for diagnostics
 *
 * Pure functions of their arguments; nothing here reads machine state.
 */

import {
  type Instruction,
  type MachineFault,
  type MachineSnapshot,
  type MachineStatus,
  NULLARY_OPERATIONS,
} from '@accuvm/types'

const NULLARY: ReadonlySet<string> = new Set(NULLARY_OPERATIONS)

export function statusToString(status: MachineStatus): string {
  return status
}

/**
 * Render an instruction the way it is written in program text
 */
export function instructionToString(instruction: Instruction): string {
  if (NULLARY.has(instruction.operation)) {
    return instruction.operation
  }
  return `${instruction.operation} ${instruction.argument}`
}

export function faultToString(fault: MachineFault): string {
  const location = fault.cursor === null ? '' : ` at instruction ${fault.cursor}`
  return `${fault.kind}${location}: ${fault.message}`
}

export interface FormatOptions {
  printData?: boolean
  printInstructions?: boolean
}

/**
 * Human-readable listing of a machine snapshot
 */
export function formatMachine(
  snapshot: MachineSnapshot,
  { printData = true, printInstructions = true }: FormatOptions = {},
): string {
  const lines = [
    `Status: ${statusToString(snapshot.status)}`,
    `Accumulator: ${snapshot.accumulator}`,
  ]

  if (snapshot.fault) {
    lines.push(`Fault: ${faultToString(snapshot.fault)}`)
  }

  if (printData) {
    lines.push('*** Data Memory ***')
    snapshot.dataMemory.forEach((value, index) => {
      lines.push(`Location ${index}: ${value}`)
    })
  }

  if (printInstructions) {
    lines.push('*** Instruction Memory ***')
    lines.push(...formatListing(snapshot.instructions))
  }

  return lines.join('\n')
}

/**
 * Numbered instruction listing, one line per instruction
 */
export function formatListing(instructions: readonly Instruction[]): string[] {
  return instructions.map(
    (instruction, index) =>
      `Instruction ${index}: ${instructionToString(instruction)}`,
  )
}

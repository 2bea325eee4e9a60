/**
 * Accumulator Machine Error Types
 *
 * Faults raised while a program runs are data (MachineFault) behind the
 * ERRORED status. The classes below cover what happens outside of a run:
 * decoding, reading program sources, and internal lifecycle misuse.
 */

import { MACHINE_FAULTS, type FaultKind } from './machine'

/**
 * Mapping from fault kinds to human-readable descriptions
 */
export const FAULT_MESSAGES: Record<FaultKind, string> = {
  [MACHINE_FAULTS.DECODE_FAILURE]: 'Program text could not be decoded',
  [MACHINE_FAULTS.OUT_OF_RANGE_ACCESS]: 'Memory location is out of range',
  [MACHINE_FAULTS.INVALID_INSERT_INDEX]:
    'Insert location is beyond the end of memory',
  [MACHINE_FAULTS.DIVISION_BY_ZERO]: 'Division by zero',
  [MACHINE_FAULTS.INVALID_JUMP_DISTANCE]: 'Jump distance must not be zero',
  [MACHINE_FAULTS.UNKNOWN_OPERATION]: 'No handler for operation',
  [MACHINE_FAULTS.MEMORY_TOO_SMALL]: 'Data memory is smaller than required',
  [MACHINE_FAULTS.STEP_LIMIT_EXCEEDED]: 'Execution step budget exhausted',
  [MACHINE_FAULTS.HANDLER_FAILURE]: 'Instruction raised an exception',
}

export class MachineError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'MachineError'
  }
}

export class DecodeError extends MachineError {
  constructor(
    message: string,
    public line: number,
    public text: string,
  ) {
    super(`line ${line}: ${message}`, 'DECODE_ERROR', { line, text })
    this.name = 'DecodeError'
  }
}

/**
 * The program source could not be obtained at all. Reported to the caller
 * directly; no load attempt was made.
 */
export class ProgramSourceError extends MachineError {
  constructor(
    public path: string,
    public override cause?: unknown,
  ) {
    super(`Unable to read program source: ${path}`, 'PROGRAM_SOURCE_ERROR', {
      path,
    })
    this.name = 'ProgramSourceError'
  }
}

export class IllegalTransitionError extends MachineError {
  constructor(
    public from: string,
    public to: string,
  ) {
    super(`Illegal status transition ${from} -> ${to}`, 'ILLEGAL_TRANSITION', {
      from,
      to,
    })
    this.name = 'IllegalTransitionError'
  }
}

/**
 * Accumulator Machine Types
 *
 * Status lifecycle, instruction set, fault records and the contracts shared
 * between the decoder, the instruction handlers and the execution engine.
 */

// Machine status lifecycle
export const MACHINE_STATUS = {
  WAITING: 'WAITING', // No program loaded, accepts load
  READY: 'READY', // Program loaded, accepts run
  RUNNING: 'RUNNING', // Executing (internal only)
  HALTED: 'HALTED', // Terminated normally
  ERRORED: 'ERRORED', // Terminated abnormally
} as const

export type MachineStatus = (typeof MACHINE_STATUS)[keyof typeof MACHINE_STATUS]

export type TerminalStatus =
  | typeof MACHINE_STATUS.HALTED
  | typeof MACHINE_STATUS.ERRORED

/**
 * Operations that carry no operand. Decoded with argument 0.
 */
export const NULLARY_OPERATIONS = ['CLEAR', 'NOOP', 'HALT', 'OUTPUT'] as const

/**
 * Operations that require exactly one integer operand
 */
export const UNARY_OPERATIONS = [
  // Accumulator/memory transfer
  'AT',
  'SET',
  // Memory shape
  'INSERT',
  'ERASE',
  // Constant arithmetic
  'ADDCONST',
  'SUBCONST',
  'MULCONST',
  'DIVCONST',
  // Memory arithmetic
  'ADDMEM',
  'SUBMEM',
  'MULMEM',
  'DIVMEM',
  // Relative jumps
  'JUMPREL',
  'JUMPZERO',
  'JUMPNZERO',
  // Diagnostic
  'CHECKMEM',
] as const

export type NullaryOperation = (typeof NULLARY_OPERATIONS)[number]
export type UnaryOperation = (typeof UNARY_OPERATIONS)[number]
export type Operation = NullaryOperation | UnaryOperation

/**
 * A decoded instruction. Immutable once decoded.
 *
 * The argument is a memory location, a constant or a jump distance
 * depending on the operation.
 */
export type Instruction =
  | { readonly operation: NullaryOperation; readonly argument: 0n }
  | { readonly operation: UnaryOperation; readonly argument: bigint }

// Fault kinds behind the ERRORED status
export const MACHINE_FAULTS = {
  DECODE_FAILURE: 'decode_failure',
  OUT_OF_RANGE_ACCESS: 'out_of_range_access',
  INVALID_INSERT_INDEX: 'invalid_insert_index',
  DIVISION_BY_ZERO: 'division_by_zero',
  INVALID_JUMP_DISTANCE: 'invalid_jump_distance',
  UNKNOWN_OPERATION: 'unknown_operation',
  MEMORY_TOO_SMALL: 'memory_too_small',
  STEP_LIMIT_EXCEEDED: 'step_limit_exceeded',
  HANDLER_FAILURE: 'handler_failure', // a handler or the output sink threw
} as const

export type FaultKind = (typeof MACHINE_FAULTS)[keyof typeof MACHINE_FAULTS]

export interface MachineFault {
  kind: FaultKind
  message: string
  /** Instruction index the fault was raised at; null for load-time faults */
  cursor: number | null
}

/**
 * Receives every value emitted by OUTPUT, in execution order
 */
export type OutputSink = (value: bigint) => void

/**
 * Read/write surface of data memory handed to instruction handlers.
 * Index-taking methods return null/false when the location is not valid
 * and leave memory untouched.
 */
export interface DataMemoryAccess {
  readonly size: number
  isValid(location: bigint): boolean
  read(location: bigint): bigint | null
  write(location: bigint, value: bigint): boolean
  insert(location: bigint, value: bigint): boolean
  erase(location: bigint): boolean
}

export interface InstructionContext {
  instruction: Instruction
  accumulator: bigint // mutated in place by handlers
  memory: DataMemoryAccess
  cursor: number
  output: OutputSink
}

/**
 * Outcome of evaluating one instruction. resultCode null = continue and move
 * the cursor by distance; a terminal code ends the run and distance is ignored.
 */
export type InstructionResult =
  | {
      resultCode: typeof MACHINE_STATUS.HALTED | null
      distance: bigint
    }
  | {
      resultCode: typeof MACHINE_STATUS.ERRORED
      distance: bigint
      fault: MachineFault
    }

export interface ExecutionLogEntry {
  step: number
  cursor: number
  instruction: string
  accumulator: bigint
}

export interface MachineOptions {
  /** Receives OUTPUT values. Defaults to the shared logger. */
  output?: OutputSink
  /** Optional execution budget; exceeding it ends the run in ERRORED */
  maxSteps?: number
  /** Record an execution trace readable through getExecutionLogs() */
  trace?: boolean
}

export interface MachineSnapshot {
  status: MachineStatus
  accumulator: bigint
  dataMemory: bigint[]
  instructions: Instruction[]
  cursor: number
  fault: MachineFault | null
}

export interface IAccumulatorMachine {
  load(source: string, initialMemory: readonly bigint[]): MachineStatus
  run(): MachineStatus
  reset(): MachineStatus
  getDataMemory(): bigint[]
  getStatus(): MachineStatus
  getAccumulator(): bigint
  getSnapshot(): MachineSnapshot
}

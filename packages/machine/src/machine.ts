/**
 * Accumulator Machine
 *
 * Execution engine: owns the accumulator, data memory and instruction store,
 * and drives the fetch -> evaluate -> advance loop until the status leaves
 * RUNNING.
 */

import { readFileSync } from 'node:fs'
import { logger } from '@accuvm/core'
import {
  type ExecutionLogEntry,
  FAULT_MESSAGES,
  type IAccumulatorMachine,
  type Instruction,
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
  MACHINE_STATUS,
  MachineError,
  type MachineFault,
  type MachineOptions,
  type MachineSnapshot,
  type MachineStatus,
  type OutputSink,
  ProgramSourceError,
  type Safe,
  safeError,
  safeResult,
} from '@accuvm/types'
import * as _ from 'radash'
import { CURSOR_CONFIG } from './config'
import { DataMemory } from './data-memory'
import { ProgramDecoder } from './decoder'
import { InstructionRegistry } from './instructions/registry'
import { InstructionStore } from './instruction-store'
import { StatusMachine } from './status-machine'

const logOutput: OutputSink = (value) => {
  logger.info('OUTPUT', value.toString())
}

export class AccumulatorMachine implements IAccumulatorMachine {
  protected readonly status = new StatusMachine()
  protected readonly memory = new DataMemory()
  protected readonly store = new InstructionStore()
  protected accumulator = 0n
  protected fault: MachineFault | null = null

  /** Step counter for the current run */
  protected executionStep = 0
  /** Per-instruction trace for the current run, filled when tracing */
  protected executionLogs: ExecutionLogEntry[] = []

  private readonly output: OutputSink
  private readonly maxSteps: number | null
  private readonly trace: boolean

  constructor(
    options: MachineOptions = {},
    protected readonly registry: InstructionRegistry = InstructionRegistry.getInstance(),
    protected readonly decoder: ProgramDecoder = new ProgramDecoder(),
  ) {
    if (
      options.maxSteps !== undefined &&
      (!Number.isInteger(options.maxSteps) || options.maxSteps < 0)
    ) {
      throw new MachineError(
        `maxSteps must be a non-negative integer, got ${options.maxSteps}`,
        'INVALID_OPTIONS',
      )
    }

    this.output = options.output ?? logOutput
    this.maxSteps = options.maxSteps ?? null
    this.trace = options.trace ?? false
  }

  /**
   * Decode a program and install it together with the initial data memory.
   * Only legal while WAITING; otherwise the current status is returned and
   * nothing changes.
   */
  load(source: string, initialMemory: readonly bigint[]): MachineStatus {
    if (!this.status.is(MACHINE_STATUS.WAITING)) {
      logger.debug('Load ignored', { status: this.status.current })
      return this.status.current
    }

    const [error, instructions] = this.decoder.decode(source)
    if (error) {
      this.fault = {
        kind: MACHINE_FAULTS.DECODE_FAILURE,
        message: error.message,
        cursor: null,
      }
      logger.debug('Load: decode failure', { line: error.line })
      return this.status.transition(MACHINE_STATUS.ERRORED)
    }

    this.store.install(instructions)
    this.memory.populate(initialMemory)

    logger.debug('Load: program installed', {
      instructions: this.store.length,
      memorySize: this.memory.size,
    })

    // An empty program leaves the machine waiting for another load
    if (this.store.isEmpty()) {
      return this.status.current
    }
    return this.status.transition(MACHINE_STATUS.READY)
  }

  /**
   * Read program text from a file, then load it. A file that cannot be read
   * is returned as an error instead of a machine status.
   */
  loadFile(
    path: string,
    initialMemory: readonly bigint[],
  ): Safe<MachineStatus, ProgramSourceError> {
    if (!this.status.is(MACHINE_STATUS.WAITING)) {
      return safeResult(this.status.current)
    }

    const [error, source] = _.try(() => readFileSync(path, 'utf8'))()
    if (error) {
      logger.debug('Load: program source unreadable', { path })
      return safeError(new ProgramSourceError(path, error))
    }

    return safeResult(this.load(source, initialMemory))
  }

  /**
   * Execute the loaded program until it halts or errors
   */
  run(): MachineStatus {
    if (!this.status.is(MACHINE_STATUS.READY)) {
      logger.debug('Run ignored', { status: this.status.current })
      return this.status.current
    }

    this.status.transition(MACHINE_STATUS.RUNNING)
    this.store.rewind()
    this.executionStep = 0
    this.executionLogs = []

    while (this.status.is(MACHINE_STATUS.RUNNING)) {
      this.step()
    }

    logger.debug('Run finished', {
      status: this.status.current,
      steps: this.executionStep,
      accumulator: this.accumulator.toString(),
    })
    return this.status.current
  }

  /**
   * Clear all state and return to WAITING. Legal from every status.
   */
  reset(): MachineStatus {
    this.accumulator = 0n
    this.memory.clear()
    this.store.clear()
    this.fault = null
    this.executionStep = 0
    this.executionLogs = []
    return this.status.reset()
  }

  /**
   * One fetch -> evaluate -> advance cycle
   */
  protected step(): void {
    if (this.maxSteps !== null && this.executionStep >= this.maxSteps) {
      this.terminate({
        kind: MACHINE_FAULTS.STEP_LIMIT_EXCEEDED,
        message: `Execution step budget exhausted after ${this.executionStep} steps`,
        cursor: this.store.cursor,
      })
      return
    }

    const instruction = this.store.current()
    if (!instruction) {
      this.status.transition(MACHINE_STATUS.HALTED)
      return
    }

    const result = this.evaluate(instruction)
    this.executionStep++

    if (result.resultCode === MACHINE_STATUS.ERRORED) {
      this.terminate(result.fault)
      return
    }
    if (result.resultCode === MACHINE_STATUS.HALTED) {
      this.status.transition(MACHINE_STATUS.HALTED)
      return
    }

    this.advance(result.distance)
  }

  /**
   * Evaluate one instruction against the accumulator and data memory
   */
  protected evaluate(instruction: Instruction): InstructionResult {
    const cursor = this.store.cursor
    const handler = this.registry.getHandler(instruction.operation)
    if (!handler) {
      return {
        resultCode: MACHINE_STATUS.ERRORED,
        distance: CURSOR_CONFIG.NEXT,
        fault: {
          kind: MACHINE_FAULTS.UNKNOWN_OPERATION,
          message: `No handler for operation ${instruction.operation}`,
          cursor,
        },
      }
    }

    const context: InstructionContext = {
      instruction,
      accumulator: this.accumulator,
      memory: this.memory,
      cursor,
      output: this.output,
    }
    const [error, result] = _.try(() => handler.execute(context))()
    if (error) {
      return {
        resultCode: MACHINE_STATUS.ERRORED,
        distance: CURSOR_CONFIG.NEXT,
        fault: {
          kind: MACHINE_FAULTS.HANDLER_FAILURE,
          message: `${FAULT_MESSAGES[MACHINE_FAULTS.HANDLER_FAILURE]}: ${error.message}`,
          cursor,
        },
      }
    }
    this.accumulator = context.accumulator

    if (this.trace) {
      this.executionLogs.push({
        step: this.executionStep,
        cursor,
        instruction: handler.disassemble(instruction),
        accumulator: this.accumulator,
      })
    }

    return result
  }

  protected advance(distance: bigint): void {
    const outcome = this.store.advance(distance)
    if (outcome === 'passed-end') {
      this.status.transition(MACHINE_STATUS.HALTED)
    } else if (outcome === 'invalid-distance') {
      this.terminate({
        kind: MACHINE_FAULTS.INVALID_JUMP_DISTANCE,
        message: 'Cannot advance the cursor by 0',
        cursor: this.store.cursor,
      })
    }
  }

  protected terminate(fault: MachineFault): void {
    this.fault = fault
    logger.debug('Machine fault', fault)
    this.status.transition(MACHINE_STATUS.ERRORED)
  }

  /**
   * Copy of the current data memory
   */
  getDataMemory(): bigint[] {
    return this.memory.snapshot()
  }

  getStatus(): MachineStatus {
    return this.status.current
  }

  getAccumulator(): bigint {
    return this.accumulator
  }

  getFault(): MachineFault | null {
    return this.fault ? { ...this.fault } : null
  }

  getInstructions(): Instruction[] {
    return this.store.list()
  }

  /**
   * Execution trace of the last run, in execution order
   */
  getExecutionLogs(): ExecutionLogEntry[] {
    return [...this.executionLogs]
  }

  getSnapshot(): MachineSnapshot {
    return {
      status: this.status.current,
      accumulator: this.accumulator,
      dataMemory: this.memory.snapshot(),
      instructions: this.store.list(),
      cursor: this.store.cursor,
      fault: this.getFault(),
    }
  }
}

/**
 * Base Instruction System
 *
 * Defines the handler interface and the abstract class all instructions
 * extend.
 */

import {
  FAULT_MESSAGES,
  type FaultKind,
  type Instruction,
  type InstructionContext,
  type InstructionResult,
  MACHINE_STATUS,
  type Operation,
} from '@accuvm/types'
import { CURSOR_CONFIG } from '../config'
import { instructionToString } from '../format'

/**
 * Base interface for all instruction handlers
 */
export interface InstructionHandler {
  readonly operation: Operation
  readonly description: string

  /**
   * Execute the instruction (mutates context in place)
   * @returns resultCode (null = continue, otherwise halted/errored) and the
   * relative distance to move the cursor by
   */
  execute(context: InstructionContext): InstructionResult

  /**
   * Disassemble instruction to string representation
   */
  disassemble(instruction: Instruction): string
}

/**
 * Abstract base class for instructions
 */
export abstract class BaseInstruction implements InstructionHandler {
  abstract readonly operation: Operation
  abstract readonly description: string

  abstract execute(context: InstructionContext): InstructionResult

  disassemble(instruction: Instruction): string {
    return instructionToString(instruction)
  }

  /**
   * Continue with the next instruction
   */
  protected next(): InstructionResult {
    return { resultCode: null, distance: CURSOR_CONFIG.NEXT }
  }

  /**
   * Continue with a relative jump
   */
  protected jump(distance: bigint): InstructionResult {
    return { resultCode: null, distance }
  }

  protected halt(): InstructionResult {
    return { resultCode: MACHINE_STATUS.HALTED, distance: CURSOR_CONFIG.NEXT }
  }

  /**
   * Terminate with a fault. The returned distance is never applied.
   */
  protected fail(
    context: InstructionContext,
    kind: FaultKind,
    detail?: string,
  ): InstructionResult {
    const message = detail
      ? `${FAULT_MESSAGES[kind]}: ${detail}`
      : FAULT_MESSAGES[kind]
    return {
      resultCode: MACHINE_STATUS.ERRORED,
      distance: CURSOR_CONFIG.NEXT,
      fault: { kind, message, cursor: context.cursor },
    }
  }
}

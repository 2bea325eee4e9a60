/**
 * Memory Arithmetic Instructions
 *
 * ADDMEM, SUBMEM, MULMEM, DIVMEM - accumulator op= memory[location]
 */

import {
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
} from '@accuvm/types'
import { divide, wrap } from '../integer'
import { BaseInstruction } from './base'

/**
 * Shared operand fetch: every memory arithmetic instruction requires a
 * valid location before touching the accumulator.
 */
abstract class MemoryArithmeticInstruction extends BaseInstruction {
  protected abstract apply(
    context: InstructionContext,
    operand: bigint,
  ): InstructionResult

  execute(context: InstructionContext): InstructionResult {
    const location = context.instruction.argument
    const operand = context.memory.read(location)
    if (operand === null) {
      return this.fail(
        context,
        MACHINE_FAULTS.OUT_OF_RANGE_ACCESS,
        `${this.operation} ${location} with memory size ${context.memory.size}`,
      )
    }

    return this.apply(context, operand)
  }
}

export class ADDMEMInstruction extends MemoryArithmeticInstruction {
  readonly operation = 'ADDMEM'
  readonly description = 'Add a memory cell to the accumulator'

  protected apply(
    context: InstructionContext,
    operand: bigint,
  ): InstructionResult {
    context.accumulator = wrap(context.accumulator + operand)
    return this.next()
  }
}

export class SUBMEMInstruction extends MemoryArithmeticInstruction {
  readonly operation = 'SUBMEM'
  readonly description = 'Subtract a memory cell from the accumulator'

  protected apply(
    context: InstructionContext,
    operand: bigint,
  ): InstructionResult {
    context.accumulator = wrap(context.accumulator - operand)
    return this.next()
  }
}

export class MULMEMInstruction extends MemoryArithmeticInstruction {
  readonly operation = 'MULMEM'
  readonly description = 'Multiply the accumulator by a memory cell'

  protected apply(
    context: InstructionContext,
    operand: bigint,
  ): InstructionResult {
    context.accumulator = wrap(context.accumulator * operand)
    return this.next()
  }
}

/**
 * DIVMEM instruction
 * A zero cell faults with the accumulator untouched.
 */
export class DIVMEMInstruction extends MemoryArithmeticInstruction {
  readonly operation = 'DIVMEM'
  readonly description = 'Divide the accumulator by a memory cell'

  protected apply(
    context: InstructionContext,
    operand: bigint,
  ): InstructionResult {
    if (operand === 0n) {
      return this.fail(
        context,
        MACHINE_FAULTS.DIVISION_BY_ZERO,
        `DIVMEM ${context.instruction.argument} holds 0`,
      )
    }

    context.accumulator = divide(context.accumulator, operand)
    return this.next()
  }
}

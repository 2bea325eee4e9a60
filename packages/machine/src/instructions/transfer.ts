/**
 * Accumulator/Memory Transfer Instructions
 *
 * CLEAR, AT, SET
 */

import {
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
} from '@accuvm/types'
import { BaseInstruction } from './base'

/**
 * CLEAR instruction
 * acc := 0
 */
export class CLEARInstruction extends BaseInstruction {
  readonly operation = 'CLEAR'
  readonly description = 'Reset the accumulator to zero'

  execute(context: InstructionContext): InstructionResult {
    context.accumulator = 0n
    return this.next()
  }
}

/**
 * AT instruction
 * acc := memory[location]
 */
export class ATInstruction extends BaseInstruction {
  readonly operation = 'AT'
  readonly description = 'Load a memory cell into the accumulator'

  execute(context: InstructionContext): InstructionResult {
    const location = context.instruction.argument
    const value = context.memory.read(location)
    if (value === null) {
      return this.fail(
        context,
        MACHINE_FAULTS.OUT_OF_RANGE_ACCESS,
        `AT ${location} with memory size ${context.memory.size}`,
      )
    }

    context.accumulator = value
    return this.next()
  }
}

/**
 * SET instruction
 * memory[location] := acc
 */
export class SETInstruction extends BaseInstruction {
  readonly operation = 'SET'
  readonly description = 'Store the accumulator into a memory cell'

  execute(context: InstructionContext): InstructionResult {
    const location = context.instruction.argument
    if (!context.memory.write(location, context.accumulator)) {
      return this.fail(
        context,
        MACHINE_FAULTS.OUT_OF_RANGE_ACCESS,
        `SET ${location} with memory size ${context.memory.size}`,
      )
    }

    return this.next()
  }
}

/**
 * Constant Arithmetic Instructions
 *
 * ADDCONST, SUBCONST, MULCONST, DIVCONST - accumulator op= constant
 * All results wrap to signed 64 bits.
 */

import {
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
} from '@accuvm/types'
import { divide, wrap } from '../integer'
import { BaseInstruction } from './base'

/**
 * ADDCONST instruction
 * acc := acc + k
 */
export class ADDCONSTInstruction extends BaseInstruction {
  readonly operation = 'ADDCONST'
  readonly description = 'Add a constant to the accumulator'

  execute(context: InstructionContext): InstructionResult {
    context.accumulator = wrap(
      context.accumulator + context.instruction.argument,
    )
    return this.next()
  }
}

/**
 * SUBCONST instruction
 * acc := acc - k
 */
export class SUBCONSTInstruction extends BaseInstruction {
  readonly operation = 'SUBCONST'
  readonly description = 'Subtract a constant from the accumulator'

  execute(context: InstructionContext): InstructionResult {
    context.accumulator = wrap(
      context.accumulator - context.instruction.argument,
    )
    return this.next()
  }
}

/**
 * MULCONST instruction
 * acc := acc * k
 */
export class MULCONSTInstruction extends BaseInstruction {
  readonly operation = 'MULCONST'
  readonly description = 'Multiply the accumulator by a constant'

  execute(context: InstructionContext): InstructionResult {
    context.accumulator = wrap(
      context.accumulator * context.instruction.argument,
    )
    return this.next()
  }
}

/**
 * DIVCONST instruction
 * acc := acc / k, truncating toward zero. k == 0 faults with the
 * accumulator untouched.
 */
export class DIVCONSTInstruction extends BaseInstruction {
  readonly operation = 'DIVCONST'
  readonly description = 'Divide the accumulator by a constant'

  execute(context: InstructionContext): InstructionResult {
    const divisor = context.instruction.argument
    if (divisor === 0n) {
      return this.fail(context, MACHINE_FAULTS.DIVISION_BY_ZERO, 'DIVCONST 0')
    }

    context.accumulator = divide(context.accumulator, divisor)
    return this.next()
  }
}

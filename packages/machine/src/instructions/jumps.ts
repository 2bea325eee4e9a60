/**
 * Relative Jump Instructions
 *
 * JUMPREL, JUMPZERO, JUMPNZERO
 */

import {
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
} from '@accuvm/types'
import { BaseInstruction } from './base'

/**
 * A zero distance is rejected before the condition is looked at.
 */
abstract class RelativeJumpInstruction extends BaseInstruction {
  protected abstract shouldJump(accumulator: bigint): boolean

  execute(context: InstructionContext): InstructionResult {
    const distance = context.instruction.argument
    if (distance === 0n) {
      return this.fail(
        context,
        MACHINE_FAULTS.INVALID_JUMP_DISTANCE,
        `${this.operation} 0`,
      )
    }

    return this.shouldJump(context.accumulator)
      ? this.jump(distance)
      : this.next()
  }
}

/**
 * JUMPREL instruction
 * Unconditional relative jump
 */
export class JUMPRELInstruction extends RelativeJumpInstruction {
  readonly operation = 'JUMPREL'
  readonly description = 'Unconditional relative jump'

  protected shouldJump(_accumulator: bigint): boolean {
    return true
  }
}

/**
 * JUMPZERO instruction
 * Jumps when the accumulator is zero
 */
export class JUMPZEROInstruction extends RelativeJumpInstruction {
  readonly operation = 'JUMPZERO'
  readonly description = 'Relative jump if the accumulator is zero'

  protected shouldJump(accumulator: bigint): boolean {
    return accumulator === 0n
  }
}

/**
 * JUMPNZERO instruction
 * Jumps when the accumulator is not zero
 */
export class JUMPNZEROInstruction extends RelativeJumpInstruction {
  readonly operation = 'JUMPNZERO'
  readonly description = 'Relative jump if the accumulator is not zero'

  protected shouldJump(accumulator: bigint): boolean {
    return accumulator !== 0n
  }
}

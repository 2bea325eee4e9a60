/**
 * Diagnostic Instructions
 */

import {
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
} from '@accuvm/types'
import { BaseInstruction } from './base'

/**
 * CHECKMEM instruction
 * Faults iff the memory size is strictly less than n; size == n passes.
 */
export class CHECKMEMInstruction extends BaseInstruction {
  readonly operation = 'CHECKMEM'
  readonly description = 'Assert a minimum memory size'

  execute(context: InstructionContext): InstructionResult {
    const required = context.instruction.argument
    if (BigInt(context.memory.size) < required) {
      return this.fail(
        context,
        MACHINE_FAULTS.MEMORY_TOO_SMALL,
        `size ${context.memory.size} < ${required}`,
      )
    }

    return this.next()
  }
}

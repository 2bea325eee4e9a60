/**
 * Control Instructions
 *
 * NOOP, HALT, OUTPUT
 */

import type { InstructionContext, InstructionResult } from '@accuvm/types'
import { BaseInstruction } from './base'

/**
 * NOOP instruction
 * No operation
 */
export class NOOPInstruction extends BaseInstruction {
  readonly operation = 'NOOP'
  readonly description = 'No operation'

  execute(_context: InstructionContext): InstructionResult {
    return this.next()
  }
}

/**
 * HALT instruction
 * Terminates the run normally
 */
export class HALTInstruction extends BaseInstruction {
  readonly operation = 'HALT'
  readonly description = 'Halt the machine'

  execute(_context: InstructionContext): InstructionResult {
    return this.halt()
  }
}

/**
 * OUTPUT instruction
 * Emits the accumulator to the output sink
 */
export class OUTPUTInstruction extends BaseInstruction {
  readonly operation = 'OUTPUT'
  readonly description = 'Emit the accumulator value'

  execute(context: InstructionContext): InstructionResult {
    context.output(context.accumulator)
    return this.next()
  }
}

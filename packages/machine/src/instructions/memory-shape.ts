/**
 * Memory Shape Instructions
 *
 * INSERT and ERASE are the only instructions that change the memory size.
 */

import {
  type InstructionContext,
  type InstructionResult,
  MACHINE_FAULTS,
} from '@accuvm/types'
import { BaseInstruction } from './base'

/**
 * INSERT instruction
 * Inserts the accumulator at location, shifting later cells right.
 * location == size appends.
 */
export class INSERTInstruction extends BaseInstruction {
  readonly operation = 'INSERT'
  readonly description = 'Insert the accumulator into memory'

  execute(context: InstructionContext): InstructionResult {
    const location = context.instruction.argument
    if (!context.memory.insert(location, context.accumulator)) {
      return this.fail(
        context,
        MACHINE_FAULTS.INVALID_INSERT_INDEX,
        `INSERT ${location} with memory size ${context.memory.size}`,
      )
    }

    return this.next()
  }
}

/**
 * ERASE instruction
 * Removes the cell at location, shifting later cells left.
 */
export class ERASEInstruction extends BaseInstruction {
  readonly operation = 'ERASE'
  readonly description = 'Remove a memory cell'

  execute(context: InstructionContext): InstructionResult {
    const location = context.instruction.argument
    if (!context.memory.erase(location)) {
      return this.fail(
        context,
        MACHINE_FAULTS.OUT_OF_RANGE_ACCESS,
        `ERASE ${location} with memory size ${context.memory.size}`,
      )
    }

    return this.next()
  }
}

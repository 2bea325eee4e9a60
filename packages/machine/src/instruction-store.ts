import type { Instruction } from '@accuvm/types'
import { CURSOR_CONFIG } from './config'

export type AdvanceOutcome = 'continue' | 'passed-end' | 'invalid-distance'

/**
 * Instruction Store
 *
 * Fixed-length (after load) instruction sequence plus a cursor that moves
 * by signed relative distances. Moving forward past the last instruction
 * reports 'passed-end'; moving backward past the first instruction clamps
 * the cursor at 0.
 */
export class InstructionStore {
  private instructions: readonly Instruction[] = []
  private position: number = CURSOR_CONFIG.START

  get length(): number {
    return this.instructions.length
  }

  get cursor(): number {
    return this.position
  }

  isEmpty(): boolean {
    return this.instructions.length === 0
  }

  install(instructions: readonly Instruction[]): void {
    this.instructions = Object.freeze([...instructions])
    this.position = CURSOR_CONFIG.START
  }

  rewind(): void {
    this.position = CURSOR_CONFIG.START
  }

  /**
   * Instruction under the cursor, or undefined once the cursor has passed the end
   */
  current(): Instruction | undefined {
    return this.instructions[this.position]
  }

  advance(distance: bigint): AdvanceOutcome {
    if (distance === 0n) {
      return 'invalid-distance'
    }

    const target = BigInt(this.position) + distance

    if (target >= BigInt(this.instructions.length)) {
      this.position = this.instructions.length
      return 'passed-end'
    }

    // Backward overflow clamps at the first instruction
    this.position = target < 0n ? 0 : Number(target)
    return 'continue'
  }

  list(): Instruction[] {
    return [...this.instructions]
  }

  clear(): void {
    this.instructions = []
    this.position = CURSOR_CONFIG.START
  }
}

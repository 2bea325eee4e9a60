import type { DataMemoryAccess } from '@accuvm/types'
import { wrap } from './integer'

/**
 * Data Memory Implementation
 *
 * Ordered, 0-indexed, resizable sequence of signed integers.
 * A location is valid iff 0 <= location < size; insertion additionally
 * accepts location == size (append).
 */
export class DataMemory implements DataMemoryAccess {
  private cells: bigint[] = []

  get size(): number {
    return this.cells.length
  }

  isValid(location: bigint): boolean {
    return location >= 0n && location < BigInt(this.cells.length)
  }

  canInsertAt(location: bigint): boolean {
    return location >= 0n && location <= BigInt(this.cells.length)
  }

  read(location: bigint): bigint | null {
    if (!this.isValid(location)) {
      return null
    }
    return this.cells[Number(location)] ?? null
  }

  write(location: bigint, value: bigint): boolean {
    if (!this.isValid(location)) {
      return false
    }
    this.cells[Number(location)] = value
    return true
  }

  insert(location: bigint, value: bigint): boolean {
    if (!this.canInsertAt(location)) {
      return false
    }
    this.cells.splice(Number(location), 0, value)
    return true
  }

  erase(location: bigint): boolean {
    if (!this.isValid(location)) {
      return false
    }
    this.cells.splice(Number(location), 1)
    return true
  }

  /**
   * Replace the contents with a wrapped copy of the given values (load time only)
   */
  populate(values: readonly bigint[]): void {
    this.cells = values.map(wrap)
  }

  snapshot(): bigint[] {
    return [...this.cells]
  }

  clear(): void {
    this.cells = []
  }
}

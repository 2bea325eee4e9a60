import type { Instruction, InstructionContext } from '@accuvm/types'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DataMemory } from '../../data-memory'
import { InstructionRegistry } from '../../instructions/registry'

function createContext(
  instruction: Instruction,
  accumulator: bigint,
  cells: bigint[],
): { context: InstructionContext; memory: DataMemory } {
  const memory = new DataMemory()
  memory.populate(cells)
  return {
    context: { instruction, accumulator, memory, cursor: 0, output: vi.fn() },
    memory,
  }
}

describe('Memory Instructions', () => {
  let registry: InstructionRegistry

  beforeEach(() => {
    registry = InstructionRegistry.getInstance()
  })

  describe('CLEAR', () => {
    it('should zero the accumulator', () => {
      const { context } = createContext({ operation: 'CLEAR', argument: 0n }, 9n, [])

      const result = registry.getHandler('CLEAR')!.execute(context)

      expect(result).toEqual({ resultCode: null, distance: 1n })
      expect(context.accumulator).toBe(0n)
    })
  })

  describe('AT', () => {
    it('should load a cell into the accumulator', () => {
      const { context } = createContext({ operation: 'AT', argument: 1n }, 0n, [4n, 7n])

      registry.getHandler('AT')!.execute(context)

      expect(context.accumulator).toBe(7n)
    })

    it('should fault at index == size', () => {
      const { context } = createContext({ operation: 'AT', argument: 2n }, 5n, [1n, 2n])

      const result = registry.getHandler('AT')!.execute(context)

      expect(result.resultCode === 'ERRORED' && result.fault.kind).toBe(
        'out_of_range_access',
      )
      expect(context.accumulator).toBe(5n)
    })
  })

  describe('SET', () => {
    it('should store the accumulator', () => {
      const { context, memory } = createContext(
        { operation: 'SET', argument: 0n },
        11n,
        [1n, 2n],
      )

      registry.getHandler('SET')!.execute(context)

      expect(memory.snapshot()).toEqual([11n, 2n])
    })

    it('should fault at index == size without writing', () => {
      const { context, memory } = createContext(
        { operation: 'SET', argument: 2n },
        11n,
        [1n, 2n],
      )

      const result = registry.getHandler('SET')!.execute(context)

      expect(result.resultCode).toBe('ERRORED')
      expect(memory.snapshot()).toEqual([1n, 2n])
    })
  })

  describe('INSERT', () => {
    it('should insert and shift later cells right', () => {
      const { context, memory } = createContext(
        { operation: 'INSERT', argument: 1n },
        9n,
        [1n, 2n],
      )

      registry.getHandler('INSERT')!.execute(context)

      expect(memory.snapshot()).toEqual([1n, 9n, 2n])
    })

    it('should append at index == size', () => {
      const { context, memory } = createContext(
        { operation: 'INSERT', argument: 2n },
        9n,
        [1n, 2n],
      )

      const result = registry.getHandler('INSERT')!.execute(context)

      expect(result.resultCode).toBeNull()
      expect(memory.snapshot()).toEqual([1n, 2n, 9n])
    })

    it('should fault beyond the end', () => {
      const { context, memory } = createContext(
        { operation: 'INSERT', argument: 3n },
        9n,
        [1n, 2n],
      )

      const result = registry.getHandler('INSERT')!.execute(context)

      expect(result.resultCode === 'ERRORED' && result.fault.kind).toBe(
        'invalid_insert_index',
      )
      expect(memory.snapshot()).toEqual([1n, 2n])
    })

    it('should fault on a negative index', () => {
      const { context } = createContext({ operation: 'INSERT', argument: -1n }, 9n, [])

      const result = registry.getHandler('INSERT')!.execute(context)

      expect(result.resultCode).toBe('ERRORED')
    })
  })

  describe('ERASE', () => {
    it('should remove a cell and shift later cells left', () => {
      const { context, memory } = createContext(
        { operation: 'ERASE', argument: 0n },
        0n,
        [1n, 2n, 3n],
      )

      registry.getHandler('ERASE')!.execute(context)

      expect(memory.snapshot()).toEqual([2n, 3n])
    })

    it('should fault at index == size', () => {
      const { context, memory } = createContext(
        { operation: 'ERASE', argument: 3n },
        0n,
        [1n, 2n, 3n],
      )

      const result = registry.getHandler('ERASE')!.execute(context)

      expect(result.resultCode === 'ERRORED' && result.fault.kind).toBe(
        'out_of_range_access',
      )
      expect(memory.snapshot()).toEqual([1n, 2n, 3n])
    })
  })

  describe('CHECKMEM', () => {
    it('should pass when the size equals n', () => {
      const { context } = createContext({ operation: 'CHECKMEM', argument: 2n }, 0n, [1n, 2n])

      expect(registry.getHandler('CHECKMEM')!.execute(context)).toEqual({
        resultCode: null,
        distance: 1n,
      })
    })

    it('should fault when the size is smaller than n', () => {
      const { context } = createContext({ operation: 'CHECKMEM', argument: 3n }, 0n, [1n, 2n])

      const result = registry.getHandler('CHECKMEM')!.execute(context)

      expect(result.resultCode === 'ERRORED' && result.fault.message).toBe(
        'Data memory is smaller than required: size 2 < 3',
      )
    })
  })
})

import { writeFileSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { MachineError, ProgramSourceError } from '@accuvm/types'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { InstructionRegistry } from '../instructions/registry'
import { AccumulatorMachine } from '../machine'

function program(...lines: string[]): string {
  return lines.join('\n')
}

describe('AccumulatorMachine', () => {
  let outputs: bigint[]
  let machine: AccumulatorMachine

  beforeEach(() => {
    outputs = []
    machine = new AccumulatorMachine({ output: (value) => outputs.push(value) })
  })

  describe('Scenarios', () => {
    it('A: stores, adds, outputs and halts', () => {
      expect(
        machine.load(program('SET 0', 'ADDCONST 5', 'OUTPUT', 'HALT'), [0n]),
      ).toBe('READY')

      expect(machine.run()).toBe('HALTED')
      expect(outputs).toEqual([5n])
      expect(machine.getDataMemory()).toEqual([0n])
      expect(machine.getAccumulator()).toBe(5n)
    })

    it('B: division by a zero constant errors', () => {
      machine.load('DIVCONST 0', [7n])

      expect(machine.run()).toBe('ERRORED')
      expect(machine.getFault()).toEqual({
        kind: 'division_by_zero',
        message: 'Division by zero: DIVCONST 0',
        cursor: 0,
      })
    })

    it('C: reading index == size errors', () => {
      machine.load('AT 2', [1n, 2n])

      expect(machine.run()).toBe('ERRORED')
      expect(machine.getFault()?.kind).toBe('out_of_range_access')
    })

    it('D: CHECKMEM passes when size == n', () => {
      machine.load(program('CHECKMEM 2', 'HALT'), [1n, 2n])

      expect(machine.run()).toBe('HALTED')
    })

    it('E: an empty program keeps the machine waiting', () => {
      expect(machine.load(program('# nothing here', ''), [1n])).toBe('WAITING')
      expect(machine.run()).toBe('WAITING')
    })
  })

  describe('Lifecycle', () => {
    it('should halt when the cursor runs off the end', () => {
      machine.load(program('ADDCONST 1', 'ADDCONST 2'), [])

      expect(machine.run()).toBe('HALTED')
      expect(machine.getAccumulator()).toBe(3n)
    })

    it('should stop at HALT without running later instructions', () => {
      machine.load(program('HALT', 'OUTPUT'), [])

      machine.run()

      expect(outputs).toEqual([])
    })

    it('should ignore load while not WAITING', () => {
      machine.load('ADDCONST 1', [4n])

      expect(machine.load('ADDCONST 9', [8n, 9n])).toBe('READY')
      expect(machine.getInstructions()).toEqual([
        { operation: 'ADDCONST', argument: 1n },
      ])
      expect(machine.getDataMemory()).toEqual([4n])
    })

    it('should ignore run once terminal', () => {
      machine.load('ADDCONST 1', [])
      machine.run()

      expect(machine.run()).toBe('HALTED')
      expect(machine.getAccumulator()).toBe(1n)
    })

    it('should error on a decode failure without installing anything', () => {
      expect(machine.load(program('CLEAR', 'BOGUS'), [1n])).toBe('ERRORED')
      expect(machine.getInstructions()).toEqual([])
      expect(machine.getDataMemory()).toEqual([])
      expect(machine.getFault()).toEqual({
        kind: 'decode_failure',
        message: "line 2: unknown operation 'BOGUS'",
        cursor: null,
      })
      expect(machine.run()).toBe('ERRORED')
    })

    it.each([
      ['WAITING', (_m: AccumulatorMachine) => {}],
      ['READY', (m: AccumulatorMachine) => m.load('HALT', [1n])],
      [
        'HALTED',
        (m: AccumulatorMachine) => {
          m.load('ADDCONST 3', [1n])
          m.run()
        },
      ],
      ['ERRORED', (m: AccumulatorMachine) => m.load('???', [])],
    ])('should reset from %s', (_status, prepare) => {
      prepare(machine)

      expect(machine.reset()).toBe('WAITING')
      expect(machine.getAccumulator()).toBe(0n)
      expect(machine.getDataMemory()).toEqual([])
      expect(machine.getInstructions()).toEqual([])
      expect(machine.getFault()).toBeNull()
    })

    it('should accept a new program after reset', () => {
      machine.load('DIVCONST 0', [])
      machine.run()
      machine.reset()

      machine.load(program('ADDCONST 2', 'OUTPUT'), [])

      expect(machine.run()).toBe('HALTED')
      expect(outputs).toEqual([2n])
    })

    it('should not alias the initial memory or the returned snapshot', () => {
      const initial = [1n, 2n]
      machine.load(program('ADDCONST 7', 'SET 0'), initial)

      machine.run()
      const snapshot = machine.getDataMemory()
      snapshot[1] = 100n

      expect(initial).toEqual([1n, 2n])
      expect(machine.getDataMemory()).toEqual([7n, 2n])
    })
  })

  describe('Error policy', () => {
    it('should leave the accumulator untouched on DIVMEM of a zero cell', () => {
      machine.load(program('ADDCONST 12', 'DIVMEM 1'), [4n, 0n])

      expect(machine.run()).toBe('ERRORED')
      expect(machine.getAccumulator()).toBe(12n)
      expect(machine.getFault()?.cursor).toBe(1)
    })

    it('should append on INSERT at size and error beyond it', () => {
      machine.load(program('ADDCONST 3', 'INSERT 2', 'INSERT 4'), [1n, 2n])

      expect(machine.run()).toBe('ERRORED')
      expect(machine.getDataMemory()).toEqual([1n, 2n, 3n])
      expect(machine.getFault()?.kind).toBe('invalid_insert_index')
    })

    it.each(['AT 1', 'SET 1', 'ERASE 1', 'ADDMEM 1', 'SUBMEM 1', 'MULMEM 1', 'DIVMEM 1'])(
      'should error on %s with a single cell',
      (line) => {
        machine.load(line, [5n])

        expect(machine.run()).toBe('ERRORED')
        expect(machine.getDataMemory()).toEqual([5n])
      },
    )

    it.each(['JUMPREL 0', 'JUMPZERO 0', 'JUMPNZERO 0'])(
      'should error on %s whatever the accumulator holds',
      (line) => {
        const zero = new AccumulatorMachine({ output: vi.fn() })
        const nonZero = new AccumulatorMachine({ output: vi.fn() })
        zero.load(line, [])
        nonZero.load(program('ADDCONST 1', line), [])

        expect(zero.run()).toBe('ERRORED')
        expect(nonZero.run()).toBe('ERRORED')
        expect(nonZero.getFault()?.kind).toBe('invalid_jump_distance')
      },
    )

    it('should error when CHECKMEM asks for more cells than exist', () => {
      machine.load(program('CHECKMEM 3', 'OUTPUT'), [1n, 2n])

      expect(machine.run()).toBe('ERRORED')
      expect(outputs).toEqual([])
    })

    it('should turn an exception from the output sink into a fault', () => {
      const failing = new AccumulatorMachine({
        output: () => {
          throw new Error('sink down')
        },
      })
      failing.load(program('ADDCONST 4', 'OUTPUT', 'ADDCONST 1'), [])

      expect(failing.run()).toBe('ERRORED')
      expect(failing.getFault()).toEqual({
        kind: 'handler_failure',
        message: 'Instruction raised an exception: sink down',
        cursor: 1,
      })
      expect(failing.getAccumulator()).toBe(4n)
      expect(failing.run()).toBe('ERRORED')
      expect(failing.reset()).toBe('WAITING')
      expect(failing.load('HALT', [])).toBe('READY')
    })

    it('should error on an operation with no registered handler', () => {
      const registry = new InstructionRegistry()
      registry.unregister('NOOP')
      const partial = new AccumulatorMachine({ output: vi.fn() }, registry)
      partial.load(program('ADDCONST 1', 'NOOP'), [])

      expect(partial.run()).toBe('ERRORED')
      expect(partial.getFault()).toEqual({
        kind: 'unknown_operation',
        message: 'No handler for operation NOOP',
        cursor: 1,
      })
      expect(partial.getAccumulator()).toBe(1n)
    })
  })

  describe('Jumps', () => {
    it('should loop with a backward conditional jump', () => {
      // Counts down from 3, emitting each value
      machine.load(
        program('AT 0', 'OUTPUT', 'SUBCONST 1', 'JUMPNZERO -2', 'SET 0'),
        [3n],
      )

      expect(machine.run()).toBe('HALTED')
      expect(outputs).toEqual([3n, 2n, 1n])
      expect(machine.getDataMemory()).toEqual([0n])
    })

    it('should skip forward over instructions', () => {
      machine.load(program('JUMPZERO 2', 'OUTPUT', 'ADDCONST 4', 'OUTPUT'), [])

      machine.run()

      expect(outputs).toEqual([4n])
    })

    it('should halt when a forward jump overshoots the end', () => {
      machine.load(program('JUMPREL 10', 'OUTPUT'), [])

      expect(machine.run()).toBe('HALTED')
      expect(outputs).toEqual([])
    })

    it('should clamp a backward overshoot at the first instruction', () => {
      machine.load(
        program('JUMPNZERO 3', 'ADDCONST 1', 'JUMPREL -100', 'OUTPUT'),
        [],
      )

      expect(machine.run()).toBe('HALTED')
      expect(outputs).toEqual([1n])
    })

    it('should keep looping through a clamped jump until the budget runs out', () => {
      const bounded = new AccumulatorMachine({
        output: (value) => outputs.push(value),
        maxSteps: 6,
      })
      bounded.load(program('ADDCONST 1', 'OUTPUT', 'JUMPREL -50'), [])

      expect(bounded.run()).toBe('ERRORED')
      expect(outputs).toEqual([1n, 2n])
      expect(bounded.getFault()).toEqual({
        kind: 'step_limit_exceeded',
        message: 'Execution step budget exhausted after 6 steps',
        cursor: 0,
      })
    })
  })

  describe('Options', () => {
    it('should reject an invalid step budget', () => {
      expect(() => new AccumulatorMachine({ maxSteps: -1 })).toThrow(MachineError)
      expect(() => new AccumulatorMachine({ maxSteps: 1.5 })).toThrow(
        'maxSteps must be a non-negative integer, got 1.5',
      )
    })

    it('should not count a program that finishes within budget as an error', () => {
      const bounded = new AccumulatorMachine({ output: vi.fn(), maxSteps: 2 })
      bounded.load(program('NOOP', 'NOOP'), [])

      expect(bounded.run()).toBe('HALTED')
    })

    it('should record an execution trace when asked', () => {
      const traced = new AccumulatorMachine({ output: vi.fn(), trace: true })
      traced.load(program('ADDCONST 2', 'JUMPREL 2', 'NOOP', 'MULCONST 3'), [])

      traced.run()

      expect(traced.getExecutionLogs()).toEqual([
        { step: 0, cursor: 0, instruction: 'ADDCONST 2', accumulator: 2n },
        { step: 1, cursor: 1, instruction: 'JUMPREL 2', accumulator: 2n },
        { step: 2, cursor: 3, instruction: 'MULCONST 3', accumulator: 6n },
      ])
    })

    it('should leave the trace empty by default', () => {
      machine.load('NOOP', [])
      machine.run()

      expect(machine.getExecutionLogs()).toEqual([])
    })
  })

  describe('loadFile', () => {
    let directory: string

    beforeEach(() => {
      directory = mkdtempSync(join(tmpdir(), 'accuvm-machine-'))
    })

    afterEach(() => {
      rmSync(directory, { recursive: true, force: true })
    })

    it('should load a program from disk', () => {
      const path = join(directory, 'add.avm')
      writeFileSync(path, program('# adds two cells', 'AT 0', 'ADDMEM 1', 'OUTPUT'))

      const [error, status] = machine.loadFile(path, [20n, 22n])

      expect(error).toBeUndefined()
      expect(status).toBe('READY')
      expect(machine.run()).toBe('HALTED')
      expect(outputs).toEqual([42n])
    })

    it('should report an unreadable source without changing status', () => {
      const path = join(directory, 'missing.avm')

      const [error, status] = machine.loadFile(path, [])

      expect(status).toBeUndefined()
      expect(error).toBeInstanceOf(ProgramSourceError)
      expect(error?.path).toBe(path)
      expect(machine.getStatus()).toBe('WAITING')
    })

    it('should not read the file outside WAITING', () => {
      machine.load('HALT', [])

      const [error, status] = machine.loadFile(join(directory, 'missing.avm'), [])

      expect(error).toBeUndefined()
      expect(status).toBe('READY')
    })
  })

  it('should expose a full snapshot', () => {
    machine.load(program('ADDCONST 5', 'HALT'), [1n])
    machine.run()

    expect(machine.getSnapshot()).toEqual({
      status: 'HALTED',
      accumulator: 5n,
      dataMemory: [1n],
      instructions: [
        { operation: 'ADDCONST', argument: 5n },
        { operation: 'HALT', argument: 0n },
      ],
      cursor: 1,
      fault: null,
    })
  })
})

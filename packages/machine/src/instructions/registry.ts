/**
 * Instruction Registry
 *
 * Central registry that imports and manages all instruction handlers.
 * Acts as a dispatcher for the execution engine.
 */

import type { Operation } from '@accuvm/types'
import {
  ADDCONSTInstruction,
  DIVCONSTInstruction,
  MULCONSTInstruction,
  SUBCONSTInstruction,
} from './arithmetic'
import {
  ADDMEMInstruction,
  DIVMEMInstruction,
  MULMEMInstruction,
  SUBMEMInstruction,
} from './arithmetic-memory'
import type { InstructionHandler } from './base'
import {
  HALTInstruction,
  NOOPInstruction,
  OUTPUTInstruction,
} from './control'
import { CHECKMEMInstruction } from './diagnostic'
import {
  JUMPNZEROInstruction,
  JUMPRELInstruction,
  JUMPZEROInstruction,
} from './jumps'
import { ERASEInstruction, INSERTInstruction } from './memory-shape'
import { ATInstruction, CLEARInstruction, SETInstruction } from './transfer'

/**
 * Maps operations to their handler implementations.
 */
export class InstructionRegistry {
  private static instance: InstructionRegistry | null = null
  private handlers: Map<Operation, InstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Shared registry with every built-in handler
   */
  static getInstance(): InstructionRegistry {
    if (!InstructionRegistry.instance) {
      InstructionRegistry.instance = new InstructionRegistry()
    }
    return InstructionRegistry.instance
  }

  /**
   * Register all instruction handlers
   */
  private registerInstructions(): void {
    // Control instructions
    this.register(new NOOPInstruction())
    this.register(new HALTInstruction())
    this.register(new OUTPUTInstruction())

    // Transfer instructions
    this.register(new CLEARInstruction())
    this.register(new ATInstruction())
    this.register(new SETInstruction())

    // Memory shape instructions
    this.register(new INSERTInstruction())
    this.register(new ERASEInstruction())

    // Constant arithmetic instructions
    this.register(new ADDCONSTInstruction())
    this.register(new SUBCONSTInstruction())
    this.register(new MULCONSTInstruction())
    this.register(new DIVCONSTInstruction())

    // Memory arithmetic instructions
    this.register(new ADDMEMInstruction())
    this.register(new SUBMEMInstruction())
    this.register(new MULMEMInstruction())
    this.register(new DIVMEMInstruction())

    // Jump instructions
    this.register(new JUMPRELInstruction())
    this.register(new JUMPZEROInstruction())
    this.register(new JUMPNZEROInstruction())

    // Diagnostic instructions
    this.register(new CHECKMEMInstruction())
  }

  /**
   * Register an instruction handler
   */
  register(handler: InstructionHandler): void {
    this.handlers.set(handler.operation, handler)
  }

  /**
   * Get instruction handler by operation
   */
  getHandler(operation: Operation): InstructionHandler | undefined {
    return this.handlers.get(operation)
  }

  hasHandler(operation: Operation): boolean {
    return this.handlers.has(operation)
  }

  getRegisteredOperations(): Operation[] {
    return Array.from(this.handlers.keys())
  }

  getAllHandlers(): InstructionHandler[] {
    return Array.from(this.handlers.values())
  }

  /**
   * Remove a handler (a machine built on such a registry faults with
   * unknown_operation when it reaches that instruction)
   */
  unregister(operation: Operation): boolean {
    return this.handlers.delete(operation)
  }
}

/**
 * Machine Package Exports
 *
 * Accumulator machine: decoder, execution engine and instruction handlers
 */

// Logger
export { logger } from '@accuvm/core'
// Re-export types from centralized types package
export * from '@accuvm/types'
// Configuration constants
export { CURSOR_CONFIG, DECODER_CONFIG, INTEGER_CONFIG } from './config'
export { DataMemory } from './data-memory'
// Program text decoder
export { ProgramDecoder } from './decoder'
// Diagnostics formatting
export {
  type FormatOptions,
  faultToString,
  formatListing,
  formatMachine,
  instructionToString,
  statusToString,
} from './format'
export { divide, isInRange, wrap } from './integer'
export { type AdvanceOutcome, InstructionStore } from './instruction-store'
// Arithmetic instructions
export {
  ADDCONSTInstruction,
  DIVCONSTInstruction,
  MULCONSTInstruction,
  SUBCONSTInstruction,
} from './instructions/arithmetic'
export {
  ADDMEMInstruction,
  DIVMEMInstruction,
  MULMEMInstruction,
  SUBMEMInstruction,
} from './instructions/arithmetic-memory'
export { BaseInstruction, type InstructionHandler } from './instructions/base'
// Control instructions
export {
  HALTInstruction,
  NOOPInstruction,
  OUTPUTInstruction,
} from './instructions/control'
export { CHECKMEMInstruction } from './instructions/diagnostic'
// Jump instructions
export {
  JUMPNZEROInstruction,
  JUMPRELInstruction,
  JUMPZEROInstruction,
} from './instructions/jumps'
export { ERASEInstruction, INSERTInstruction } from './instructions/memory-shape'
// Instruction registry and handlers
export { InstructionRegistry } from './instructions/registry'
export {
  ATInstruction,
  CLEARInstruction,
  SETInstruction,
} from './instructions/transfer'
// Core execution engine
export { AccumulatorMachine } from './machine'
export { isTerminalStatus, StatusMachine } from './status-machine'

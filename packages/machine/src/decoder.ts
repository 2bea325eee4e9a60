import {
  DecodeError,
  type Instruction,
  NULLARY_OPERATIONS,
  type NullaryOperation,
  type Safe,
  safeError,
  safeResult,
  UNARY_OPERATIONS,
  type UnaryOperation,
} from '@accuvm/types'
import { DECODER_CONFIG } from './config'
import { isInRange } from './integer'

const NULLARY: ReadonlySet<string> = new Set(NULLARY_OPERATIONS)
const UNARY: ReadonlySet<string> = new Set(UNARY_OPERATIONS)

function isNullaryOperation(mnemonic: string): mnemonic is NullaryOperation {
  return NULLARY.has(mnemonic)
}

function isUnaryOperation(mnemonic: string): mnemonic is UnaryOperation {
  return UNARY.has(mnemonic)
}

/**
 * Program Decoder
 *
 * Turns program text into an ordered instruction sequence. Line format:
 *
 *   MNEMONIC [argument]   # optional trailing comment
 *
 * Blank and comment-only lines are skipped. Decoding stops at the first
 * malformed line.
 */
export class ProgramDecoder {
  /**
   * Decode a complete program
   */
  decode(source: string): Safe<Instruction[], DecodeError> {
    const instructions: Instruction[] = []
    const lines = source.split(/\r?\n/)

    for (const [index, text] of lines.entries()) {
      const [error, instruction] = this.decodeLine(text, index + 1)
      if (error) {
        return safeError(error)
      }
      if (instruction) {
        instructions.push(instruction)
      }
    }

    return safeResult(instructions)
  }

  /**
   * Decode a single line. Resolves to null for blank and comment lines.
   */
  decodeLine(
    text: string,
    lineNumber: number,
  ): Safe<Instruction | null, DecodeError> {
    const commentStart = text.indexOf(DECODER_CONFIG.COMMENT_PREFIX)
    const body = (commentStart === -1 ? text : text.slice(0, commentStart)).trim()
    if (body === '') {
      return safeResult(null)
    }

    const [head = '', ...operands] = body.split(/\s+/)
    const mnemonic = head.toUpperCase()

    if (isNullaryOperation(mnemonic)) {
      if (operands.length > 0) {
        return safeError(
          new DecodeError(`${mnemonic} takes no argument`, lineNumber, text),
        )
      }
      return safeResult<Instruction>({ operation: mnemonic, argument: 0n })
    }

    if (!isUnaryOperation(mnemonic)) {
      return safeError(
        new DecodeError(`unknown operation '${head}'`, lineNumber, text),
      )
    }

    const [operand] = operands
    if (operand === undefined || operands.length > 1) {
      return safeError(
        new DecodeError(
          `${mnemonic} takes exactly one argument`,
          lineNumber,
          text,
        ),
      )
    }

    if (!DECODER_CONFIG.ARGUMENT_PATTERN.test(operand)) {
      return safeError(
        new DecodeError(`invalid integer '${operand}'`, lineNumber, text),
      )
    }

    const argument = BigInt(operand)
    if (!isInRange(argument)) {
      return safeError(
        new DecodeError(
          `argument ${operand} is outside the signed 64-bit range`,
          lineNumber,
          text,
        ),
      )
    }

    return safeResult<Instruction>({ operation: mnemonic, argument })
  }
}

/**
 * WordCodec - Bit-field packing over a 256-bit word
 *
 * Words and field values are unsigned bigints. Every write zeroes the target
 * range first and leaves all other bits untouched, so fields sharing a word
 * never interfere as long as their ranges do not overlap.
 *
 * Achievement words use the following layout:
 *
 *   bit 255        permanent flag
 *   bits [0, 255)  price
 */

import { PreconditionViolation } from './errors.js'
import { MAX_WORD, PERMANENT_OFFSET, PRICE_OFFSET, WORD_BITS } from './constants.js'
import type { AchievementTerms } from './types.js'

export class WordCodec {
  /**
   * Write `value` into `word` at `[bitOffset, bitOffset + bitWidth)`.
   *
   * @throws PreconditionViolation `VALUE_OVERFLOW` if the value does not fit,
   * `OUT_OF_BOUNDS` if the range leaves the word
   */
  static insert(word: bigint, value: bigint, bitWidth: number, bitOffset: number): bigint {
    WordCodec.validateWord(word)
    WordCodec.validateRange(bitWidth, bitOffset)
    const mask = WordCodec.mask(bitWidth)
    if (value < 0n || value > mask) {
      throw new PreconditionViolation('VALUE_OVERFLOW', `Value ${value} does not fit in ${bitWidth} bits`)
    }
    const shift = BigInt(bitOffset)
    const cleared = word & ~(mask << shift) & MAX_WORD
    return cleared | (value << shift)
  }

  /**
   * Read the unsigned value stored at `[bitOffset, bitOffset + bitWidth)`.
   */
  static extract(word: bigint, bitWidth: number, bitOffset: number): bigint {
    WordCodec.validateWord(word)
    WordCodec.validateRange(bitWidth, bitOffset)
    return (word >> BigInt(bitOffset)) & WordCodec.mask(bitWidth)
  }

  static insertBool(word: bigint, value: boolean, bitOffset: number): bigint {
    return WordCodec.insert(word, value ? 1n : 0n, 1, bitOffset)
  }

  static decodeBool(word: bigint, bitOffset: number): boolean {
    return WordCodec.extract(word, 1, bitOffset) === 1n
  }

  static insertUint255(word: bigint, value: bigint, bitOffset: number): bigint {
    return WordCodec.insert(word, value, 255, bitOffset)
  }

  static decodeUint255(word: bigint, bitOffset: number): bigint {
    return WordCodec.extract(word, 255, bitOffset)
  }

  /**
   * Pack an achievement's price and permanence into one word.
   */
  static packAchievementTerms(terms: AchievementTerms): bigint {
    let word = WordCodec.insertUint255(0n, terms.price, PRICE_OFFSET)
    word = WordCodec.insertBool(word, terms.permanent, PERMANENT_OFFSET)
    return word
  }

  static unpackAchievementTerms(word: bigint): AchievementTerms {
    return {
      price: WordCodec.decodeUint255(word, PRICE_OFFSET),
      permanent: WordCodec.decodeBool(word, PERMANENT_OFFSET)
    }
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private static mask(bitWidth: number): bigint {
    return (1n << BigInt(bitWidth)) - 1n
  }

  private static validateWord(word: bigint): void {
    if (word < 0n || word > MAX_WORD) {
      throw new PreconditionViolation('OUT_OF_BOUNDS', `Word is outside the ${WORD_BITS}-bit range`)
    }
  }

  private static validateRange(bitWidth: number, bitOffset: number): void {
    if (!Number.isInteger(bitWidth) || !Number.isInteger(bitOffset)) {
      throw new PreconditionViolation('OUT_OF_BOUNDS', 'Bit width and offset must be integers')
    }
    if (bitWidth < 1 || bitOffset < 0 || bitOffset + bitWidth > WORD_BITS) {
      throw new PreconditionViolation(
        'OUT_OF_BOUNDS',
        `Field [${bitOffset}, ${bitOffset + bitWidth}) exceeds the ${WORD_BITS}-bit word`
      )
    }
  }
}


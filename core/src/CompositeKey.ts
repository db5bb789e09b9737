/**
 * CompositeKey - (contract address, achievement id) as a single lookup key
 *
 * The address occupies the high 160 bits and the id the low 96 bits of a
 * 256-bit value, so distinct pairs always map to distinct keys.
 */

import { getAddress, numberToHex, type Address } from 'viem'
import { PreconditionViolation } from './errors.js'
import { ACHIEVEMENT_ID_BITS, MAX_ACHIEVEMENT_ID } from './constants.js'
import { normalizeAddress } from './utils.js'

const ID_SHIFT = BigInt(ACHIEVEMENT_ID_BITS)

export interface DecodedCompositeKey {
  address: Address
  achievementId: bigint
}

export class CompositeKey {
  static encode(address: Address, achievementId: bigint): bigint {
    const normalized = normalizeAddress(address)
    if (achievementId < 0n || achievementId > MAX_ACHIEVEMENT_ID) {
      throw new PreconditionViolation(
        'INVALID_ACHIEVEMENT_ID',
        `Achievement id ${achievementId} does not fit in ${ACHIEVEMENT_ID_BITS} bits`
      )
    }
    return (BigInt(normalized) << ID_SHIFT) | achievementId
  }

  static decode(key: bigint): DecodedCompositeKey {
    if (key < 0n || key >> 256n !== 0n) {
      throw new PreconditionViolation('OUT_OF_BOUNDS', `Composite key is outside the 256-bit range: ${key}`)
    }
    return {
      address: getAddress(numberToHex(key >> ID_SHIFT, { size: 20 })),
      achievementId: key & MAX_ACHIEVEMENT_ID
    }
  }
}

/**
 * Input validation shared by the ledger components
 */

import { getAddress, isAddress, isAddressEqual, type Address } from 'viem'
import { PreconditionViolation } from './errors.js'
import { MAX_ACHIEVEMENT_ID, MAX_TOKEN_ID, NULL_ADDRESS } from './constants.js'

/**
 * Validate and checksum an address.
 *
 * @throws PreconditionViolation if the value is not a 20-byte hex address
 */
export function normalizeAddress(value: string, label: string = 'address'): Address {
  if (!isAddress(value, { strict: false })) {
    throw new PreconditionViolation('INVALID_ADDRESS', `Invalid ${label}: ${value}`)
  }
  return getAddress(value)
}

/**
 * Validate and checksum an address that must not be the null address.
 */
export function requireNonNullAddress(value: string, label: string = 'address'): Address {
  const address = normalizeAddress(value, label)
  if (isNullAddress(address)) {
    throw new PreconditionViolation('NULL_ADDRESS', `${label} must not be the null address`)
  }
  return address
}

export function isNullAddress(address: Address): boolean {
  return isAddressEqual(address, NULL_ADDRESS)
}

/**
 * Achievement ids are positive and fit in 96 bits.
 */
export function requireAchievementId(id: bigint): bigint {
  if (id < 1n || id > MAX_ACHIEVEMENT_ID) {
    throw new PreconditionViolation('INVALID_ACHIEVEMENT_ID', `Invalid achievement id: ${id}`)
  }
  return id
}

/**
 * The `count` ids following `last`.
 *
 * @throws PreconditionViolation `ID_EXHAUSTED` if any of them would exceed 96 bits
 */
export function nextAchievementIds(last: bigint, count: number): bigint[] {
  if (last + BigInt(count) > MAX_ACHIEVEMENT_ID) {
    throw new PreconditionViolation('ID_EXHAUSTED', 'Achievement ids are exhausted')
  }
  return Array.from({ length: count }, (_, i) => last + 1n + BigInt(i))
}

export function requireTokenId(tokenId: bigint): bigint {
  if (tokenId < 0n || tokenId > MAX_TOKEN_ID) {
    throw new PreconditionViolation('INVALID_TOKEN_ID', `Invalid token id: ${tokenId}`)
  }
  return tokenId
}

export function requirePositiveAmount(amount: bigint): bigint {
  if (amount < 1n) {
    throw new PreconditionViolation('INVALID_AMOUNT', `Amount must be positive, got ${amount}`)
  }
  return amount
}

/**
 * Render an unknown thrown value for log and error messages.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

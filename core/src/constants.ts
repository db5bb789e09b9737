/**
 * Token-Bound Ledger Constants
 *
 * Bit layout, id bounds and defaults shared across the core library.
 */

import type { Address } from 'viem'

// ---------------------------------------------------------------------------
// Word Layout
// ---------------------------------------------------------------------------

/** Width of a storage word in bits */
export const WORD_BITS = 256

/** Largest value a storage word can hold */
export const MAX_WORD = (1n << 256n) - 1n

/** Bits reserved for the achievement price */
export const PRICE_BITS = 255

/** Offset of the price field inside an achievement word */
export const PRICE_OFFSET = 0

/** Offset of the permanence flag (most significant bit) */
export const PERMANENT_OFFSET = 255

/** Largest price an achievement may carry */
export const MAX_PRICE = (1n << 255n) - 1n

// ---------------------------------------------------------------------------
// Identifier Bounds
// ---------------------------------------------------------------------------

/** Bits available to achievement ids */
export const ACHIEVEMENT_ID_BITS = 96

/** Largest achievement id the counter can assign */
export const MAX_ACHIEVEMENT_ID = (1n << 96n) - 1n

/** Bits occupied by a contract address */
export const ADDRESS_BITS = 160

/** Largest external token id (uint256) */
export const MAX_TOKEN_ID = MAX_WORD

// ---------------------------------------------------------------------------
// Ownership Protocol
// ---------------------------------------------------------------------------

/** Signature queried when a contract has no override */
export const DEFAULT_OWNER_OF_SIGNATURE = 'ownerOf(uint256)'

/** The null address */
export const NULL_ADDRESS: Address = '0x0000000000000000000000000000000000000000'

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Base URI used when none is configured */
export const DEFAULT_BASE_URI = ''

/** Data passed along with balance transfers made by the ledger */
export const EMPTY_TRANSFER_DATA = '0x' as const

/** Prefix for console output from the ledger */
export const LOG_PREFIX = '[TokenBoundLedger]'

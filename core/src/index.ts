/**
 * @token-bound/core - Achievements bound to externally-owned NFTs
 *
 * This library provides:
 * - Priced, optionally permanent achievements minted by an administrator
 * - Binding achievement units to any (contract, tokenId) the caller owns
 * - Exact-price purchases paid into a pull-payment escrow
 * - Ownership checks against NFT contracts with non-standard owner functions
 *
 * @example
 * ```typescript
 * import { TokenBoundLedger } from '@token-bound/core'
 *
 * const { ledger, admin } = TokenBoundLedger.deploy({
 *   address: ledgerAddress,
 *   administrator: adminAddress,
 *   rpcUrl: 'http://localhost:8545'
 * })
 *
 * const id = await ledger.mint(admin, { to: holder, amount: 1n, price: 10n, permanent: true })
 * await ledger.bind({ caller: holder, contractAddress: nft, tokenId: 7n, achievementId: id, uri: '' })
 * ledger.isBound(nft, 7n, id) // true
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { TokenBoundLedger, AdminCapability } from './TokenBoundLedger.js'

// Components
export { WordCodec } from './WordCodec.js'
export { CompositeKey } from './CompositeKey.js'
export type { DecodedCompositeKey } from './CompositeKey.js'
export {
  OwnershipOracle,
  DefaultOwnershipSource,
  CustomSignatureSource,
  PublicClientReader
} from './OwnershipOracle.js'
export type { OwnershipSource, CallClient } from './OwnershipOracle.js'
export { MultiTokenBalances, PullPaymentEscrow } from './MultiTokenBalances.js'
export { OperationQueue } from './OperationQueue.js'

// Errors
export {
  LedgerError,
  PreconditionViolation,
  AuthorizationFailure,
  StateConflict,
  ExternalResolutionFailure,
  PaymentMismatch,
  isLedgerError
} from './errors.js'
export type { LedgerErrorKind, LedgerErrorCode } from './errors.js'

// Types
export type {
  // Achievement types
  AchievementTerms,
  MintParams,
  MintBatchParams,

  // Binding types
  Binding,
  ExternalToken,
  BindParams,
  UnbindParams,
  PurchaseParams,
  PurchaseAndBindParams,

  // Collaborators
  BalanceLedger,
  PaymentEscrow,
  ContractReader,
  Logger,

  // Events
  LedgerEvent,
  LedgerEventListener,
  MintTokenBoundTokenEvent,
  BindTokenBoundTokenEvent,
  UnbindTokenBoundTokenEvent,
  PurchaseTokenBoundTokenEvent,

  // Configuration types
  TokenBoundLedgerConfig,
  ResolvedTokenBoundLedgerConfig
} from './types.js'

// Constants
export {
  WORD_BITS,
  PRICE_BITS,
  PRICE_OFFSET,
  PERMANENT_OFFSET,
  MAX_PRICE,
  ACHIEVEMENT_ID_BITS,
  MAX_ACHIEVEMENT_ID,
  DEFAULT_OWNER_OF_SIGNATURE,
  NULL_ADDRESS
} from './constants.js'

// Validation helpers
export { normalizeAddress, requireNonNullAddress, isNullAddress } from './utils.js'

/**
 * Token-Bound Ledger Type Definitions
 */

import type { Address, Hex } from 'viem'

// ---------------------------------------------------------------------------
// Achievement Types
// ---------------------------------------------------------------------------

/**
 * The terms packed into an achievement's storage word
 */
export interface AchievementTerms {
  /** Exact payment required to purchase one unit (at most 2^255 - 1) */
  price: bigint
  /** Whether a bound unit can never be unbound */
  permanent: boolean
}

/**
 * Parameters for minting a single achievement
 */
export interface MintParams extends AchievementTerms {
  /** Recipient of the initial supply */
  to: Address
  /** Number of units to credit (positive) */
  amount: bigint
  /** Optional per-achievement URI */
  uri?: string
}

/**
 * Parallel sequences for `mintBatch`; entry `i` of each describes one achievement
 */
export interface MintBatchParams {
  to: Address
  amounts: bigint[]
  uris: string[]
  prices: bigint[]
  permanents: boolean[]
}

// ---------------------------------------------------------------------------
// Binding Types
// ---------------------------------------------------------------------------

/**
 * State recorded for one (contract, achievement, external token) triple
 */
export interface Binding {
  bound: boolean
  uri: string
}

/**
 * Identifies an externally-owned token
 */
export interface ExternalToken {
  contractAddress: Address
  tokenId: bigint
}

export interface BindParams extends ExternalToken {
  /** Account performing the bind; must own both the unit and the external token */
  caller: Address
  achievementId: bigint
  /** Binding-scoped metadata */
  uri: string
}

export interface UnbindParams extends ExternalToken {
  caller: Address
  achievementId: bigint
}

export interface PurchaseParams {
  caller: Address
  achievementId: bigint
  /** Value submitted with the purchase, in the smallest settlement unit */
  value: bigint
}

export interface PurchaseAndBindParams extends PurchaseParams, ExternalToken {
  uri: string
}

// ---------------------------------------------------------------------------
// Collaborator Interfaces
// ---------------------------------------------------------------------------

/**
 * Multi-token balance ledger holding achievement units
 */
export interface BalanceLedger {
  mint(to: Address, id: bigint, amount: bigint): void
  transfer(from: Address, to: Address, id: bigint, amount: bigint, data: Hex): void
  balanceOf(account: Address, id: bigint): bigint
}

/**
 * Deferred-payment escrow; the payee withdraws elsewhere
 */
export interface PaymentEscrow {
  deposit(payee: Address, amount: bigint): void
  depositsOf(payee: Address): bigint
}

/**
 * Read-only access to external contracts. Implementations must not send
 * value or mutate state.
 */
export interface ContractReader {
  call(request: { to: Address, data: Hex }): Promise<Hex>
}

/**
 * Subset of `console` used for diagnostics
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface MintTokenBoundTokenEvent {
  type: 'MintTokenBoundToken'
  to: Address
  achievementId: bigint
  amount: bigint
  price: bigint
  permanent: boolean
}

export interface BindTokenBoundTokenEvent {
  type: 'BindTokenBoundToken'
  operator: Address
  contractAddress: Address
  tokenId: bigint
  achievementId: bigint
  uri: string
}

export interface UnbindTokenBoundTokenEvent {
  type: 'UnbindTokenBoundToken'
  operator: Address
  contractAddress: Address
  tokenId: bigint
  achievementId: bigint
}

export interface PurchaseTokenBoundTokenEvent {
  type: 'PurchaseTokenBoundToken'
  operator: Address
  achievementId: bigint
}

export type LedgerEvent =
  | MintTokenBoundTokenEvent
  | BindTokenBoundTokenEvent
  | UnbindTokenBoundTokenEvent
  | PurchaseTokenBoundTokenEvent

export type LedgerEventListener = (event: LedgerEvent) => void

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * Configuration for a token-bound ledger
 */
export interface TokenBoundLedgerConfig {
  /** The ledger's own address; bound units are held here */
  address: Address
  /** Initial administrator; also the seller for purchases */
  administrator: Address
  /** Reader for ownership queries (default: viem public client over `rpcUrl`) */
  reader?: ContractReader
  /** JSON-RPC endpoint for the default reader */
  rpcUrl?: string
  /** Balance ledger (default: in-memory `MultiTokenBalances`) */
  balances?: BalanceLedger
  /** Escrow for purchase proceeds (default: in-memory `PullPaymentEscrow`) */
  escrow?: PaymentEscrow
  /** Recipient of purchase proceeds */
  payee?: Address
  /** Prefix for achievements without their own URI */
  baseURI?: string
  /** Initial owner-function overrides, keyed by contract address */
  ownerOfFunctions?: Record<Address, string>
  /** Diagnostics sink (default: console) */
  logger?: Logger
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedTokenBoundLedgerConfig {
  address: Address
  administrator: Address
  reader: ContractReader
  balances: BalanceLedger
  escrow: PaymentEscrow
  payee?: Address
  baseURI: string
  ownerOfFunctions: Record<Address, string>
  logger: Logger
}

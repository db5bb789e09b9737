/**
 * TokenBoundLedger - Achievements bound to externally-owned NFTs
 *
 * Main class of the library. Provides:
 * - Minting priced, optionally permanent achievements
 * - Binding units to (contract, tokenId) pairs owned by the caller
 * - Unbinding non-permanent units back to the caller
 * - Exact-price purchases paid into escrow for the payee
 *
 * Mutating operations run one at a time through an `OperationQueue`. Each one
 * checks every precondition (including the ownership query) before it
 * changes anything, then applies all of its changes in a single synchronous
 * step. A failed precondition leaves no trace. When a configured balance
 * ledger or escrow throws partway through, the change that raised it is the
 * last one applied.
 */

import { createPublicClient, http, type Address } from 'viem'

import { CompositeKey } from './CompositeKey.js'
import { MultiTokenBalances, PullPaymentEscrow } from './MultiTokenBalances.js'
import { OperationQueue } from './OperationQueue.js'
import { OwnershipOracle, PublicClientReader } from './OwnershipOracle.js'
import { WordCodec } from './WordCodec.js'
import {
  AuthorizationFailure,
  PaymentMismatch,
  PreconditionViolation,
  StateConflict
} from './errors.js'
import {
  DEFAULT_BASE_URI,
  EMPTY_TRANSFER_DATA,
  LOG_PREFIX,
  MAX_PRICE
} from './constants.js'
import type {
  AchievementTerms,
  BindParams,
  Binding,
  LedgerEvent,
  LedgerEventListener,
  MintBatchParams,
  MintParams,
  PurchaseAndBindParams,
  PurchaseParams,
  ResolvedTokenBoundLedgerConfig,
  TokenBoundLedgerConfig,
  UnbindParams
} from './types.js'
import {
  nextAchievementIds,
  normalizeAddress,
  requireAchievementId,
  requireNonNullAddress,
  requirePositiveAmount,
  requireTokenId
} from './utils.js'

/**
 * Proof of administrator authority. Only the instance returned by
 * `TokenBoundLedger.deploy` (or by the latest `transferAdministration`) is
 * accepted; constructing another one grants nothing.
 */
export class AdminCapability {
  constructor(readonly account: Address) { }
}

/**
 * TokenBoundLedger
 *
 * @example
 * ```typescript
 * const { ledger, admin } = TokenBoundLedger.deploy({
 *   address: ledgerAddress,
 *   administrator: adminAddress,
 *   rpcUrl: 'http://localhost:8545'
 * })
 *
 * const id = await ledger.mint(admin, {
 *   to: adminAddress,
 *   amount: 10n,
 *   price: 1000n,
 *   permanent: false
 * })
 * await ledger.setPayee(admin, treasury)
 *
 * await ledger.purchase({ caller: player, achievementId: id, value: 1000n })
 * await ledger.bind({ caller: player, contractAddress: nft, tokenId: 42n, achievementId: id, uri: '' })
 * ```
 */
export class TokenBoundLedger {
  private config: ResolvedTokenBoundLedgerConfig
  private readonly oracle: OwnershipOracle
  private readonly queue = new OperationQueue()
  private readonly listeners = new Set<LedgerEventListener>()

  private admin: AdminCapability
  private payeeAddress?: Address
  private baseURI: string
  private lastAchievementId = 0n

  // achievement id -> packed price/permanence word
  private readonly terms = new Map<bigint, bigint>()
  private readonly uris = new Map<bigint, string>()
  // composite key -> external token id -> binding
  private readonly bindings = new Map<bigint, Map<bigint, Binding>>()

  private constructor(config: TokenBoundLedgerConfig) {
    this.config = this.resolveConfig(config)
    this.oracle = new OwnershipOracle(this.config.reader, this.config.ownerOfFunctions)
    this.admin = new AdminCapability(this.config.administrator)
    this.payeeAddress = this.config.payee
    this.baseURI = this.config.baseURI
  }

  /**
   * Create a ledger together with its administrator capability.
   */
  static deploy(config: TokenBoundLedgerConfig): { ledger: TokenBoundLedger, admin: AdminCapability } {
    const ledger = new TokenBoundLedger(config)
    return { ledger, admin: ledger.admin }
  }

  // ---------------------------------------------------------------------------
  // Minting
  // ---------------------------------------------------------------------------

  /**
   * Mint a new achievement and credit its initial supply.
   *
   * @returns The new achievement id
   */
  async mint(admin: AdminCapability, params: MintParams): Promise<bigint> {
    return await this.queue.run('mint', () => {
      this.requireAdmin(admin)
      const to = requireNonNullAddress(params.to, 'recipient')
      requirePositiveAmount(params.amount)
      const word = this.packTerms(params)
      const [id] = this.reserveIds(1)

      this.config.balances.mint(to, id, params.amount)
      this.commitAchievement(id, word, params.uri)
      this.emit({
        type: 'MintTokenBoundToken',
        to,
        achievementId: id,
        amount: params.amount,
        price: params.price,
        permanent: params.permanent
      })
      return id
    })
  }

  /**
   * Mint several achievements with consecutive ids. Nothing is minted unless
   * every entry is valid. Each entry is committed as soon as its supply is
   * credited, so if the balance ledger fails on entry k, entries before k
   * stay minted and no id is ever handed out twice.
   *
   * @returns The new achievement ids, in input order
   */
  async mintBatch(admin: AdminCapability, params: MintBatchParams): Promise<bigint[]> {
    return await this.queue.run('mintBatch', () => {
      this.requireAdmin(admin)
      const to = requireNonNullAddress(params.to, 'recipient')
      const { amounts, uris, prices, permanents } = params
      const count = amounts.length
      if (uris.length !== count || prices.length !== count || permanents.length !== count) {
        throw new PreconditionViolation(
          'LENGTH_MISMATCH',
          `Batch lengths differ: amounts ${count}, uris ${uris.length}, prices ${prices.length}, permanents ${permanents.length}`
        )
      }
      if (count === 0) {
        throw new PreconditionViolation('EMPTY_BATCH', 'Batch must contain at least one achievement')
      }

      amounts.forEach(requirePositiveAmount)
      const words = prices.map((price, i) => this.packTerms({ price, permanent: permanents[i] }))
      const ids = this.reserveIds(count)

      ids.forEach((id, i) => {
        this.config.balances.mint(to, id, amounts[i])
        this.commitAchievement(id, words[i], uris[i])
        this.emit({
          type: 'MintTokenBoundToken',
          to,
          achievementId: id,
          amount: amounts[i],
          price: prices[i],
          permanent: permanents[i]
        })
      })
      return ids
    })
  }

  // ---------------------------------------------------------------------------
  // Binding
  // ---------------------------------------------------------------------------

  /**
   * Bind one unit of an achievement to an external token owned by the caller.
   * The unit moves into the ledger's custody.
   */
  async bind(params: BindParams): Promise<void> {
    await this.queue.run('bind', async () => await this.executeBind(params))
  }

  /**
   * Release a bound unit back to the caller, who must own the external token.
   * Permanent achievements cannot be unbound.
   */
  async unbind(params: UnbindParams): Promise<void> {
    await this.queue.run('unbind', async () => {
      const caller = requireNonNullAddress(params.caller, 'caller')
      const contract = normalizeAddress(params.contractAddress, 'contract address')
      const tokenId = requireTokenId(params.tokenId)
      const id = requireAchievementId(params.achievementId)
      const key = CompositeKey.encode(contract, id)

      if (this.bindingAt(key, tokenId)?.bound !== true) {
        throw new StateConflict('NOT_BOUND', `Achievement ${id} is not bound to ${contract} #${tokenId}`)
      }
      if (this.isPermanent(id)) {
        throw new StateConflict('PERMANENTLY_BOUND', `Achievement ${id} is permanent and cannot be unbound`)
      }
      await this.requireTokenOwner(contract, tokenId, caller)

      this.config.balances.transfer(this.config.address, caller, id, 1n, EMPTY_TRANSFER_DATA)
      this.bindingsFor(key).delete(tokenId)
      this.emit({
        type: 'UnbindTokenBoundToken',
        operator: caller,
        contractAddress: contract,
        tokenId,
        achievementId: id
      })
    })
  }

  // ---------------------------------------------------------------------------
  // Purchasing
  // ---------------------------------------------------------------------------

  /**
   * Buy one unit from the administrator's stock. `value` must equal the price
   * exactly; it is deposited into escrow for the payee.
   */
  async purchase(params: PurchaseParams): Promise<void> {
    await this.queue.run('purchase', () => this.executePurchase(params))
  }

  /**
   * Purchase a unit, then bind it.
   *
   * The two steps are not atomic: if the bind fails, the purchase stays
   * committed (the unit remains with the caller and the payment stays in
   * escrow) and the bind error is rethrown.
   */
  async purchaseAndBind(params: PurchaseAndBindParams): Promise<void> {
    await this.queue.run('purchaseAndBind', async () => {
      this.executePurchase(params)
      await this.executeBind(params)
    })
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  async setPayee(admin: AdminCapability, payee: Address): Promise<void> {
    await this.queue.run('setPayee', () => {
      this.requireAdmin(admin)
      this.payeeAddress = requireNonNullAddress(payee, 'payee')
    })
  }

  /**
   * Query `signature` instead of `ownerOf(uint256)` on `contract`.
   */
  async setOwnerOfFunction(admin: AdminCapability, contract: Address, signature: string): Promise<void> {
    await this.queue.run('setOwnerOfFunction', () => {
      this.requireAdmin(admin)
      this.oracle.setOwnerOfFunction(requireNonNullAddress(contract, 'contract address'), signature)
    })
  }

  async setBaseURI(admin: AdminCapability, uri: string): Promise<void> {
    await this.queue.run('setBaseURI', () => {
      this.requireAdmin(admin)
      this.baseURI = uri
    })
  }

  /**
   * Hand administration to `account`. The given capability stops working;
   * the returned one replaces it.
   */
  async transferAdministration(admin: AdminCapability, account: Address): Promise<AdminCapability> {
    return await this.queue.run('transferAdministration', () => {
      this.requireAdmin(admin)
      this.admin = new AdminCapability(requireNonNullAddress(account, 'administrator'))
      return this.admin
    })
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  priceOf(achievementId: bigint): bigint {
    return this.termsOf(achievementId).price
  }

  isPermanent(achievementId: bigint): boolean {
    return this.termsOf(achievementId).permanent
  }

  isBound(contractAddress: Address, tokenId: bigint, achievementId: bigint): boolean {
    return this.lookupBinding(contractAddress, tokenId, achievementId)?.bound ?? false
  }

  /**
   * URI recorded with a binding; empty when not bound.
   */
  bindingURI(contractAddress: Address, tokenId: bigint, achievementId: bigint): string {
    return this.lookupBinding(contractAddress, tokenId, achievementId)?.uri ?? ''
  }

  /**
   * Per-achievement URI, falling back to the base URI followed by the id.
   */
  achievementURI(achievementId: bigint): string {
    const id = requireAchievementId(achievementId)
    const uri = this.uris.get(id)
    if (uri !== undefined) return uri
    return this.baseURI === '' ? '' : `${this.baseURI}${id}`
  }

  balanceOf(account: Address, achievementId: bigint): bigint {
    return this.config.balances.balanceOf(normalizeAddress(account, 'account'), requireAchievementId(achievementId))
  }

  ownerOfFunction(contractAddress: Address): string {
    return this.oracle.resolveFunction(contractAddress)
  }

  /** Highest id assigned so far (0 before the first mint) */
  currentAchievementId(): bigint {
    return this.lastAchievementId
  }

  payee(): Address | undefined {
    return this.payeeAddress
  }

  administrator(): Address {
    return this.admin.account
  }

  /** The ledger's custody address */
  address(): Address {
    return this.config.address
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Receive events after each committed change.
   *
   * Listeners run inside the operation that emitted the event; a listener
   * that calls back into the ledger synchronously gets `REENTRANT_CALL`.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: LedgerEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private async executeBind(params: BindParams): Promise<void> {
    const caller = requireNonNullAddress(params.caller, 'caller')
    const contract = normalizeAddress(params.contractAddress, 'contract address')
    const tokenId = requireTokenId(params.tokenId)
    const id = requireAchievementId(params.achievementId)
    const key = CompositeKey.encode(contract, id)

    if (this.bindingAt(key, tokenId)?.bound === true) {
      throw new StateConflict('ALREADY_BOUND', `Achievement ${id} is already bound to ${contract} #${tokenId}`)
    }
    if (this.config.balances.balanceOf(caller, id) < 1n) {
      throw new AuthorizationFailure('INSUFFICIENT_BALANCE', `${caller} holds no units of achievement ${id}`)
    }
    await this.requireTokenOwner(contract, tokenId, caller)

    this.config.balances.transfer(caller, this.config.address, id, 1n, EMPTY_TRANSFER_DATA)
    this.bindingsFor(key).set(tokenId, { bound: true, uri: params.uri })
    this.emit({
      type: 'BindTokenBoundToken',
      operator: caller,
      contractAddress: contract,
      tokenId,
      achievementId: id,
      uri: params.uri
    })
  }

  private executePurchase(params: PurchaseParams): void {
    const caller = requireNonNullAddress(params.caller, 'caller')
    const id = requireAchievementId(params.achievementId)
    const payee = this.payeeAddress
    if (payee === undefined) {
      throw new PreconditionViolation('PAYEE_NOT_SET', 'No payee is configured for purchases')
    }
    const seller = this.admin.account
    if (this.config.balances.balanceOf(seller, id) < 1n) {
      throw new StateConflict('SOLD_OUT', `Achievement ${id} is not available for purchase`)
    }
    const price = this.priceOf(id)
    if (params.value !== price) {
      throw new PaymentMismatch(price, params.value)
    }

    // Payment is recorded before the unit moves
    this.config.escrow.deposit(payee, params.value)
    this.config.balances.transfer(seller, caller, id, 1n, EMPTY_TRANSFER_DATA)
    this.emit({ type: 'PurchaseTokenBoundToken', operator: caller, achievementId: id })
  }

  private async requireTokenOwner(contract: Address, tokenId: bigint, caller: Address): Promise<void> {
    const owns = await this.oracle.ownsToken(contract, tokenId, caller)
    if (!owns) {
      throw new AuthorizationFailure('NOT_TOKEN_OWNER', `${caller} does not own ${contract} #${tokenId}`)
    }
  }

  private requireAdmin(admin: AdminCapability): void {
    if (admin !== this.admin) {
      throw new AuthorizationFailure('NOT_ADMINISTRATOR', 'Caller is not the ledger administrator')
    }
  }

  private packTerms(terms: AchievementTerms): bigint {
    if (terms.price < 1n || terms.price > MAX_PRICE) {
      throw new PreconditionViolation('INVALID_PRICE', `Price must be between 1 and 2^255 - 1, got ${terms.price}`)
    }
    return WordCodec.packAchievementTerms(terms)
  }

  private termsOf(achievementId: bigint): AchievementTerms {
    const word = this.terms.get(requireAchievementId(achievementId)) ?? 0n
    return WordCodec.unpackAchievementTerms(word)
  }

  /**
   * Ids for the next `count` achievements, without advancing the counter.
   */
  private reserveIds(count: number): bigint[] {
    return nextAchievementIds(this.lastAchievementId, count)
  }

  private commitAchievement(id: bigint, word: bigint, uri?: string): void {
    this.lastAchievementId = id
    this.terms.set(id, word)
    if (uri !== undefined && uri !== '') {
      this.uris.set(id, uri)
    }
  }

  private lookupBinding(contractAddress: Address, tokenId: bigint, achievementId: bigint): Binding | undefined {
    const key = CompositeKey.encode(normalizeAddress(contractAddress, 'contract address'), requireAchievementId(achievementId))
    return this.bindingAt(key, requireTokenId(tokenId))
  }

  private bindingAt(key: bigint, tokenId: bigint): Binding | undefined {
    return this.bindings.get(key)?.get(tokenId)
  }

  private bindingsFor(key: bigint): Map<bigint, Binding> {
    let byToken = this.bindings.get(key)
    if (!byToken) {
      byToken = new Map()
      this.bindings.set(key, byToken)
    }
    return byToken
  }

  private emit(event: LedgerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        this.config.logger.error(`${LOG_PREFIX} Listener failed on ${event.type}:`, error)
      }
    }
  }

  private resolveConfig(config: TokenBoundLedgerConfig): ResolvedTokenBoundLedgerConfig {
    return {
      address: requireNonNullAddress(config.address, 'ledger address'),
      administrator: requireNonNullAddress(config.administrator, 'administrator'),
      reader: config.reader ?? new PublicClientReader(createPublicClient({ transport: http(config.rpcUrl) })),
      balances: config.balances ?? new MultiTokenBalances(),
      escrow: config.escrow ?? new PullPaymentEscrow(),
      payee: config.payee === undefined ? undefined : requireNonNullAddress(config.payee, 'payee'),
      baseURI: config.baseURI ?? DEFAULT_BASE_URI,
      ownerOfFunctions: config.ownerOfFunctions ?? {},
      logger: config.logger ?? console
    }
  }
}

/**
 * In-memory multi-token balance ledger and pull-payment escrow.
 *
 * These are the default collaborators of `TokenBoundLedger`. A deployment
 * backed by an external asset ledger supplies its own `BalanceLedger` and
 * `PaymentEscrow` through the config.
 */

import { getAddress, type Address, type Hex } from 'viem'
import { AuthorizationFailure, PreconditionViolation } from './errors.js'
import type { BalanceLedger, PaymentEscrow } from './types.js'
import { requirePositiveAmount, requireNonNullAddress } from './utils.js'

export class MultiTokenBalances implements BalanceLedger {
  // id -> account -> amount
  private readonly balances = new Map<bigint, Map<Address, bigint>>()

  mint(to: Address, id: bigint, amount: bigint): void {
    const recipient = requireNonNullAddress(to, 'recipient')
    requirePositiveAmount(amount)
    this.credit(recipient, id, amount)
  }

  /**
   * Move `amount` units of `id`. `data` is accepted for interface parity with
   * multi-token standards and is not interpreted here.
   */
  transfer(from: Address, to: Address, id: bigint, amount: bigint, data: Hex): void {
    const sender = requireNonNullAddress(from, 'sender')
    const recipient = requireNonNullAddress(to, 'recipient')
    requirePositiveAmount(amount)

    const available = this.balanceOf(sender, id)
    if (available < amount) {
      throw new AuthorizationFailure(
        'INSUFFICIENT_BALANCE',
        `Insufficient balance of ${id} for ${sender}. Have ${available}, need ${amount}`
      )
    }
    this.holders(id).set(sender, available - amount)
    this.credit(recipient, id, amount)
  }

  balanceOf(account: Address, id: bigint): bigint {
    return this.balances.get(id)?.get(getAddress(account)) ?? 0n
  }

  private credit(account: Address, id: bigint, amount: bigint): void {
    const holders = this.holders(id)
    holders.set(account, (holders.get(account) ?? 0n) + amount)
  }

  private holders(id: bigint): Map<Address, bigint> {
    let holders = this.balances.get(id)
    if (!holders) {
      holders = new Map()
      this.balances.set(id, holders)
    }
    return holders
  }
}

/**
 * Escrow that accumulates deposits per payee until withdrawn elsewhere.
 */
export class PullPaymentEscrow implements PaymentEscrow {
  private readonly deposits = new Map<Address, bigint>()

  deposit(payee: Address, amount: bigint): void {
    const recipient = requireNonNullAddress(payee, 'payee')
    if (amount < 0n) {
      throw new PreconditionViolation('INVALID_AMOUNT', `Deposit must not be negative, got ${amount}`)
    }
    this.deposits.set(recipient, this.depositsOf(recipient) + amount)
  }

  depositsOf(payee: Address): bigint {
    return this.deposits.get(getAddress(payee)) ?? 0n
  }
}

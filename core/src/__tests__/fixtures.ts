/**
 * Shared test fixtures: well-known addresses and an in-process NFT reader.
 *
 * The addresses use digits only, so their checksummed form equals the literal.
 */

import { encodeAbiParameters, getAddress, hexToBigInt, sliceHex, type Address, type Hex } from 'viem'
import type { ContractReader } from '../types.js'

export const ADMIN: Address = '0x1000000000000000000000000000000000000001'
export const LEDGER: Address = '0x2000000000000000000000000000000000000002'
export const ALICE: Address = '0x3000000000000000000000000000000000000003'
export const BOB: Address = '0x4000000000000000000000000000000000000004'
export const NFT: Address = '0x5000000000000000000000000000000000000005'
export const PAYEE: Address = '0x6000000000000000000000000000000000000006'
export const OTHER_NFT: Address = '0x7000000000000000000000000000000000000007'

/**
 * Answers owner queries from a table, keyed by contract, selector and token.
 * Unknown tokens revert, like an ERC-721 `ownerOf` on a nonexistent id.
 */
export class FakeNftReader implements ContractReader {
  readonly calls: Array<{ to: Address, data: Hex }> = []
  private readonly owners = new Map<string, Address>()
  private readonly failures = new Map<Address, Error>()
  private readonly rawResponses = new Map<Address, Hex>()
  private onCall?: () => Promise<void>

  setOwner(contract: Address, tokenId: bigint, owner: Address, selector: Hex = '0x6352211e'): void {
    this.owners.set(this.key(contract, selector, tokenId), owner)
  }

  failOn(contract: Address, error: Error): void {
    this.failures.set(getAddress(contract), error)
  }

  respondWith(contract: Address, payload: Hex): void {
    this.rawResponses.set(getAddress(contract), payload)
  }

  /** Run `hook` during every call, before answering */
  duringCall(hook: () => Promise<void>): void {
    this.onCall = hook
  }

  async call(request: { to: Address, data: Hex }): Promise<Hex> {
    this.calls.push(request)
    if (this.onCall) {
      await this.onCall()
    }

    const failure = this.failures.get(request.to)
    if (failure) throw failure
    const raw = this.rawResponses.get(request.to)
    if (raw !== undefined) return raw

    const selector = sliceHex(request.data, 0, 4)
    const tokenId = hexToBigInt(sliceHex(request.data, 4))
    const owner = this.owners.get(this.key(request.to, selector, tokenId))
    if (owner === undefined) {
      throw new Error('execution reverted')
    }
    return encodeAbiParameters([{ type: 'address' }], [owner])
  }

  private key(contract: Address, selector: Hex, tokenId: bigint): string {
    return `${getAddress(contract)}:${selector}:${tokenId}`
  }
}

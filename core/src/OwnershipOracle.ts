/**
 * OwnershipOracle - "who owns token X" against arbitrary NFT contracts
 *
 * Each external contract is queried through an `OwnershipSource`: the default
 * `ownerOf(uint256)`, or a custom signature registered for that contract.
 * Queries go through a `ContractReader`, which only performs read-only calls.
 */

import {
  concatHex,
  encodeAbiParameters,
  getAddress,
  hexToBigInt,
  isAddressEqual,
  numberToHex,
  size,
  sliceHex,
  toFunctionSelector,
  type Address,
  type Hex
} from 'viem'

import { ExternalResolutionFailure, PreconditionViolation } from './errors.js'
import { ADDRESS_BITS, DEFAULT_OWNER_OF_SIGNATURE } from './constants.js'
import type { ContractReader } from './types.js'
import { describeError, isNullAddress, normalizeAddress, requireTokenId } from './utils.js'

/** A function taking a single uint256 */
const OWNER_QUERY_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*\(uint256\)$/

const ADDRESS_LIMIT = 1n << BigInt(ADDRESS_BITS)

// ---------------------------------------------------------------------------
// Ownership Sources
// ---------------------------------------------------------------------------

/**
 * How the owner of a token is asked for on one contract
 */
export interface OwnershipSource {
  readonly signature: string
  readonly selector: Hex
  encodeQuery(tokenId: bigint): Hex
}

abstract class SignatureOwnershipSource implements OwnershipSource {
  readonly selector: Hex

  constructor(readonly signature: string) {
    this.selector = toFunctionSelector(signature)
  }

  encodeQuery(tokenId: bigint): Hex {
    return concatHex([this.selector, encodeAbiParameters([{ type: 'uint256' }], [tokenId])])
  }
}

/**
 * The standard `ownerOf(uint256)` query
 */
export class DefaultOwnershipSource extends SignatureOwnershipSource {
  constructor() {
    super(DEFAULT_OWNER_OF_SIGNATURE)
  }
}

/**
 * A contract-specific query such as `getOwner(uint256)`
 */
export class CustomSignatureSource extends SignatureOwnershipSource {
  constructor(signature: string) {
    super(CustomSignatureSource.validateSignature(signature))
  }

  /**
   * @throws PreconditionViolation unless the signature names a function of one uint256
   */
  static validateSignature(signature: string): string {
    const trimmed = signature.trim()
    if (!OWNER_QUERY_PATTERN.test(trimmed)) {
      throw new PreconditionViolation(
        'INVALID_SIGNATURE',
        `Owner function must take a single uint256, got "${signature}"`
      )
    }
    return trimmed
  }
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/**
 * The part of a viem `PublicClient` the reader needs
 */
export interface CallClient {
  call(args: { to: Address, data: Hex }): Promise<{ data?: Hex }>
}

/**
 * ContractReader over a viem public client. `eth_call` carries no value and
 * never commits state.
 */
export class PublicClientReader implements ContractReader {
  constructor(private readonly client: CallClient) { }

  async call(request: { to: Address, data: Hex }): Promise<Hex> {
    const { data } = await this.client.call({ to: request.to, data: request.data })
    return data ?? '0x'
  }
}

// ---------------------------------------------------------------------------
// Oracle
// ---------------------------------------------------------------------------

export class OwnershipOracle {
  private readonly defaultSource = new DefaultOwnershipSource()
  private readonly overrides = new Map<Address, OwnershipSource>()

  constructor(
    private readonly reader: ContractReader,
    overrides: Record<Address, string> = {}
  ) {
    for (const [contract, signature] of Object.entries(overrides)) {
      this.setOwnerOfFunction(normalizeAddress(contract, 'contract address'), signature)
    }
  }

  /**
   * Register (or replace) the owner query used for `contract`.
   */
  setOwnerOfFunction(contract: Address, signature: string): void {
    const source = new CustomSignatureSource(signature)
    this.overrides.set(normalizeAddress(contract, 'contract address'), source)
  }

  resolveSource(contract: Address): OwnershipSource {
    return this.overrides.get(normalizeAddress(contract, 'contract address')) ?? this.defaultSource
  }

  /**
   * The signature that will be called on `contract`
   */
  resolveFunction(contract: Address): string {
    return this.resolveSource(contract).signature
  }

  /**
   * Ask `contract` who owns `tokenId`.
   *
   * @throws ExternalResolutionFailure if the contract is the null address, the
   * call fails, or the result is not a single ABI-encoded address
   */
  async ownerOf(contract: Address, tokenId: bigint): Promise<Address> {
    const target = normalizeAddress(contract, 'contract address')
    requireTokenId(tokenId)
    if (isNullAddress(target)) {
      throw new ExternalResolutionFailure('NULL_CONTRACT', 'Cannot query ownership on the null address')
    }

    const source = this.resolveSource(target)
    let payload: Hex
    try {
      payload = await this.reader.call({ to: target, data: source.encodeQuery(tokenId) })
    } catch (error) {
      throw new ExternalResolutionFailure(
        'CALL_FAILED',
        `${source.signature} failed on ${target}: ${describeError(error)}`,
        error
      )
    }

    return OwnershipOracle.decodeOwner(payload, target)
  }

  /**
   * Whether `claimedOwner` currently owns `tokenId` on `contract`.
   */
  async ownsToken(contract: Address, tokenId: bigint, claimedOwner: Address): Promise<boolean> {
    const owner = await this.ownerOf(contract, tokenId)
    return isAddressEqual(owner, normalizeAddress(claimedOwner, 'claimed owner'))
  }

  private static decodeOwner(payload: Hex, contract: Address): Address {
    if (size(payload) < 32) {
      throw new ExternalResolutionFailure(
        'UNDECODABLE_OWNER',
        `Owner query on ${contract} returned ${size(payload)} bytes, expected an address`
      )
    }
    const word = hexToBigInt(sliceHex(payload, 0, 32))
    if (word >= ADDRESS_LIMIT) {
      throw new ExternalResolutionFailure(
        'UNDECODABLE_OWNER',
        `Owner query on ${contract} returned a value wider than an address`
      )
    }
    return getAddress(numberToHex(word, { size: 20 }))
  }
}

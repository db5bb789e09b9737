/**
 * OwnershipOracle Tests
 *
 * Owner-function resolution, call encoding, and the failure modes that must
 * surface as ExternalResolutionFailure rather than a yes/no answer.
 */

import { toFunctionSelector, type Address, type Hex } from 'viem'
import {
  CustomSignatureSource,
  DefaultOwnershipSource,
  OwnershipOracle,
  PublicClientReader
} from '../OwnershipOracle.js'
import { ExternalResolutionFailure } from '../errors.js'
import { ALICE, BOB, FakeNftReader, NFT, OTHER_NFT } from './fixtures.js'

const NULL: Address = '0x0000000000000000000000000000000000000000'

describe('OwnershipOracle', () => {
  let reader: FakeNftReader
  let oracle: OwnershipOracle

  beforeEach(() => {
    reader = new FakeNftReader()
    oracle = new OwnershipOracle(reader)
  })

  describe('sources', () => {
    it('should encode ownerOf(uint256) by default', () => {
      const source = new DefaultOwnershipSource()
      expect(source.signature).toBe('ownerOf(uint256)')
      expect(source.selector).toBe('0x6352211e')
      expect(source.encodeQuery(42n)).toBe('0x6352211e' + '0'.repeat(62) + '2a')
    })

    it('should accept custom single-uint256 signatures', () => {
      const source = new CustomSignatureSource(' getOwner(uint256) ')
      expect(source.signature).toBe('getOwner(uint256)')
      expect(source.selector).toBe(toFunctionSelector('getOwner(uint256)'))
    })

    it('should reject signatures that do not take one uint256', () => {
      for (const signature of ['ownerOf(address)', 'ownerOf(uint256,uint256)', 'ownerOf', '']) {
        expect(() => new CustomSignatureSource(signature)).toThrow(
          expect.objectContaining({ kind: 'PreconditionViolation', code: 'INVALID_SIGNATURE' })
        )
      }
    })
  })

  describe('resolveFunction', () => {
    it('should default to ownerOf(uint256)', () => {
      expect(oracle.resolveFunction(NFT)).toBe('ownerOf(uint256)')
    })

    it('should return the override for its contract only', () => {
      oracle.setOwnerOfFunction(NFT, 'holderOf(uint256)')
      expect(oracle.resolveFunction(NFT)).toBe('holderOf(uint256)')
      expect(oracle.resolveFunction(OTHER_NFT)).toBe('ownerOf(uint256)')
    })

    it('should take initial overrides from the constructor', () => {
      const configured = new OwnershipOracle(reader, { [OTHER_NFT]: 'getOwner(uint256)' })
      expect(configured.resolveFunction(OTHER_NFT)).toBe('getOwner(uint256)')
    })

    it('should let a later override replace an earlier one', () => {
      oracle.setOwnerOfFunction(NFT, 'holderOf(uint256)')
      oracle.setOwnerOfFunction(NFT, 'getOwner(uint256)')
      expect(oracle.resolveFunction(NFT)).toBe('getOwner(uint256)')
    })
  })

  describe('ownsToken', () => {
    it('should confirm the reported owner', async () => {
      reader.setOwner(NFT, 42n, ALICE)
      await expect(oracle.ownsToken(NFT, 42n, ALICE)).resolves.toBe(true)
      await expect(oracle.ownsToken(NFT, 42n, BOB)).resolves.toBe(false)
    })

    it('should compare addresses regardless of case', async () => {
      const mixed: Address = '0x00000000000000000000000000000000000000aB'
      reader.setOwner(NFT, 1n, '0x00000000000000000000000000000000000000ab')
      await expect(oracle.ownsToken(NFT, 1n, mixed)).resolves.toBe(true)
    })

    it('should call the override signature when one is set', async () => {
      const selector = toFunctionSelector('getOwner(uint256)')
      oracle.setOwnerOfFunction(NFT, 'getOwner(uint256)')
      reader.setOwner(NFT, 9n, BOB, selector)

      await expect(oracle.ownsToken(NFT, 9n, BOB)).resolves.toBe(true)
      expect(reader.calls).toHaveLength(1)
      expect(reader.calls[0].to).toBe(NFT)
      expect(reader.calls[0].data.startsWith(selector)).toBe(true)
    })

    it('should fail on the null contract without calling it', async () => {
      await expect(oracle.ownsToken(NULL, 1n, ALICE)).rejects.toMatchObject({
        kind: 'ExternalResolutionFailure',
        code: 'NULL_CONTRACT'
      })
      expect(reader.calls).toHaveLength(0)
    })

    it('should fail when the call reverts', async () => {
      const revert = new Error('execution reverted')
      reader.failOn(NFT, revert)

      const error = await oracle.ownsToken(NFT, 1n, ALICE).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(ExternalResolutionFailure)
      expect(error).toMatchObject({ code: 'CALL_FAILED', cause: revert })
    })

    it('should fail when the token does not exist', async () => {
      await expect(oracle.ownsToken(NFT, 404n, ALICE)).rejects.toMatchObject({ code: 'CALL_FAILED' })
    })

    it('should fail on a payload shorter than one word', async () => {
      reader.respondWith(NFT, '0x1234')
      await expect(oracle.ownsToken(NFT, 1n, ALICE)).rejects.toMatchObject({
        kind: 'ExternalResolutionFailure',
        code: 'UNDECODABLE_OWNER'
      })
    })

    it('should fail on an empty payload', async () => {
      reader.respondWith(NFT, '0x')
      await expect(oracle.ownsToken(NFT, 1n, ALICE)).rejects.toMatchObject({ code: 'UNDECODABLE_OWNER' })
    })

    it('should fail when the word has bits above the address', async () => {
      reader.respondWith(NFT, `0x${'ff'.repeat(32)}`)
      await expect(oracle.ownsToken(NFT, 1n, ALICE)).rejects.toMatchObject({ code: 'UNDECODABLE_OWNER' })
    })

    it('should reject token ids wider than 256 bits before calling', async () => {
      await expect(oracle.ownsToken(NFT, 1n << 256n, ALICE)).rejects.toMatchObject({
        kind: 'PreconditionViolation',
        code: 'INVALID_TOKEN_ID'
      })
      expect(reader.calls).toHaveLength(0)
    })
  })
})

describe('PublicClientReader', () => {
  it('should forward the call and return its data', async () => {
    const requests: Array<{ to: Address, data: Hex }> = []
    const reader = new PublicClientReader({
      async call(args) {
        requests.push(args)
        return { data: '0xabcd' }
      }
    })

    await expect(reader.call({ to: NFT, data: '0x6352211e' })).resolves.toBe('0xabcd')
    expect(requests).toEqual([{ to: NFT, data: '0x6352211e' }])
  })

  it('should map a missing result to empty data', async () => {
    const reader = new PublicClientReader({
      async call() {
        return {}
      }
    })
    await expect(reader.call({ to: NFT, data: '0x' })).resolves.toBe('0x')
  })
})

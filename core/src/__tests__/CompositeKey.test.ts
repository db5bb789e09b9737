import { getAddress } from 'viem'
import { CompositeKey } from '../CompositeKey.js'
import { MAX_ACHIEVEMENT_ID } from '../constants.js'
import { NFT, OTHER_NFT } from './fixtures.js'

describe('CompositeKey', () => {
  describe('encode', () => {
    it('should place the address above the 96-bit id', () => {
      expect(CompositeKey.encode(NFT, 1n)).toBe((BigInt(NFT) << 96n) | 1n)
    })

    it('should accept lowercase and checksummed addresses alike', () => {
      const lower = '0xabcdef0000000000000000000000000000000001'
      const key = CompositeKey.encode(lower, 7n)
      expect(CompositeKey.decode(key).address).toBe(getAddress(lower))
      expect(CompositeKey.encode(getAddress(lower), 7n)).toBe(key)
    })

    it('should produce distinct keys for distinct pairs', () => {
      const low = '0x0000000000000000000000000000000000000001'
      const pairs: Array<[`0x${string}`, bigint]> = [
        [NFT, 1n],
        [NFT, 2n],
        [OTHER_NFT, 1n],
        [low, 0n],
        ['0x0000000000000000000000000000000000000000', MAX_ACHIEVEMENT_ID]
      ]
      const keys = new Set(pairs.map(([address, id]) => CompositeKey.encode(address, id)))
      expect(keys.size).toBe(pairs.length)
    })

    it('should reject ids wider than 96 bits', () => {
      expect(() => CompositeKey.encode(NFT, MAX_ACHIEVEMENT_ID + 1n)).toThrow(
        expect.objectContaining({ code: 'INVALID_ACHIEVEMENT_ID' })
      )
      expect(() => CompositeKey.encode(NFT, -1n)).toThrow(
        expect.objectContaining({ code: 'INVALID_ACHIEVEMENT_ID' })
      )
    })

    it('should reject malformed addresses', () => {
      expect(() => CompositeKey.encode('0x1234', 1n)).toThrow(
        expect.objectContaining({ kind: 'PreconditionViolation', code: 'INVALID_ADDRESS' })
      )
    })
  })

  describe('decode', () => {
    it('should invert encode', () => {
      const key = CompositeKey.encode(OTHER_NFT, MAX_ACHIEVEMENT_ID)
      expect(CompositeKey.decode(key)).toEqual({ address: OTHER_NFT, achievementId: MAX_ACHIEVEMENT_ID })
    })

    it('should reject keys wider than 256 bits', () => {
      expect(() => CompositeKey.decode(1n << 256n)).toThrow(
        expect.objectContaining({ code: 'OUT_OF_BOUNDS' })
      )
    })
  })
})

import { MultiTokenBalances, PullPaymentEscrow } from '../MultiTokenBalances.js'
import { ALICE, BOB, PAYEE } from './fixtures.js'

describe('MultiTokenBalances', () => {
  let balances: MultiTokenBalances

  beforeEach(() => {
    balances = new MultiTokenBalances()
  })

  it('should credit minted units per id', () => {
    balances.mint(ALICE, 1n, 5n)
    balances.mint(ALICE, 1n, 2n)
    balances.mint(ALICE, 2n, 1n)

    expect(balances.balanceOf(ALICE, 1n)).toBe(7n)
    expect(balances.balanceOf(ALICE, 2n)).toBe(1n)
    expect(balances.balanceOf(BOB, 1n)).toBe(0n)
  })

  it('should move units between accounts', () => {
    balances.mint(ALICE, 1n, 3n)
    balances.transfer(ALICE, BOB, 1n, 2n, '0x')

    expect(balances.balanceOf(ALICE, 1n)).toBe(1n)
    expect(balances.balanceOf(BOB, 1n)).toBe(2n)
  })

  it('should look up accounts regardless of case', () => {
    const lower = '0xabcdef0000000000000000000000000000000001'
    balances.mint(lower, 1n, 1n)
    expect(balances.balanceOf('0xABCDEF0000000000000000000000000000000001', 1n)).toBe(1n)
  })

  it('should reject transfers above the balance', () => {
    balances.mint(ALICE, 1n, 1n)
    expect(() => balances.transfer(ALICE, BOB, 1n, 2n, '0x')).toThrow(
      expect.objectContaining({ kind: 'AuthorizationFailure', code: 'INSUFFICIENT_BALANCE' })
    )
    expect(balances.balanceOf(ALICE, 1n)).toBe(1n)
  })

  it('should reject zero amounts', () => {
    expect(() => balances.mint(ALICE, 1n, 0n)).toThrow(expect.objectContaining({ code: 'INVALID_AMOUNT' }))
  })
})

describe('PullPaymentEscrow', () => {
  it('should accumulate deposits per payee', () => {
    const escrow = new PullPaymentEscrow()
    escrow.deposit(PAYEE, 10n)
    escrow.deposit(PAYEE, 5n)

    expect(escrow.depositsOf(PAYEE)).toBe(15n)
    expect(escrow.depositsOf(ALICE)).toBe(0n)
  })

  it('should reject the null payee', () => {
    const escrow = new PullPaymentEscrow()
    expect(() => escrow.deposit('0x0000000000000000000000000000000000000000', 1n)).toThrow(
      expect.objectContaining({ code: 'NULL_ADDRESS' })
    )
  })
})
